// backend/services/item/src/repo/catRepo.ts
import type { Cat } from "../models/Item";

/** Read-only lookup over a fixed list of cats. */
export class CatRepo {
  private readonly cats: readonly Cat[];

  constructor(cats: readonly Cat[]) {
    this.cats = cats.map((c) => ({ ...c }));
  }

  public async all(): Promise<readonly Cat[]> {
    return this.cats;
  }

  public async findById(id: number): Promise<Cat | undefined> {
    return this.cats.find((c) => c.id === id);
  }
}
