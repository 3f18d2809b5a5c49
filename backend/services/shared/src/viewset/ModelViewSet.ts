// backend/services/shared/src/viewset/ModelViewSet.ts
/**
 * Purpose:
 * - CRUD viewset whose five actions are orchestration over a Serializer and
 *   three storage hooks supplied by the subclass (ModelHooks).
 *
 * Flow:
 * - list     getModels() → one bound serializer per item → 200 [..]
 * - retrieve getModelOr404(pk) → 200 serialize()
 * - create   isValid(body) → doCreate() → 201 serialize()
 * - update   getModelOr404(pk) → isValid(body, partial) → doUpdate() → 200
 * - destroy  getModelOr404(pk) → doDestroy() → 204
 *
 * Notes:
 * - Update input is always partial (PUT and PATCH): only supplied fields are
 *   validated and applied; `required` is enforced on create only.
 * - `deps` are handed to the serializer constructor, so storage reaches the
 *   write hooks without globals.
 */

import { NotFound, ValidationError } from "../errors/ApiError";
import type { Serializer, SerializerClass } from "../serializer/Serializer";
import { GenericViewSet } from "./GenericViewSet";
import { ALL_ACTIONS, actionSet, created, noContent, ok, type ActionResponse, type Pk, type ViewSetAction } from "./actions";

type Awaitable<T> = T | Promise<T>;

/** Storage/serializer capabilities a model viewset is built on. */
export interface ModelHooks<TModel extends object, TDeps> {
  getSerializerClass(): SerializerClass<TModel, TDeps>;
  getModels(): Awaitable<readonly TModel[]>;
  /** null/undefined when no model has this pk. */
  getModel(pk: Pk): Awaitable<TModel | null | undefined>;
}

export abstract class GenericModelViewSet<TModel extends object, TDeps = undefined>
  extends GenericViewSet<TDeps>
  implements ModelHooks<TModel, TDeps>
{
  public abstract getSerializerClass(): SerializerClass<TModel, TDeps>;
  public abstract getModels(): Awaitable<readonly TModel[]>;
  public abstract getModel(pk: Pk): Awaitable<TModel | null | undefined>;

  protected getSerializer(instance: TModel | null = null): Serializer<TModel> {
    const Cls = this.getSerializerClass();
    return new Cls(instance, this.deps);
  }

  protected async getModelOr404(pk: Pk): Promise<TModel> {
    const model = await this.getModel(pk);
    if (model === null || model === undefined) {
      throw new NotFound("Model with such primary key was not found.");
    }
    return model;
  }
}

export abstract class ModelViewSet<TModel extends object, TDeps = undefined> extends GenericModelViewSet<
  TModel,
  TDeps
> {
  public static override readonly actions: ReadonlySet<ViewSetAction> = actionSet(...ALL_ACTIONS);

  public override async list(): Promise<ActionResponse> {
    const models = await this.getModels();
    return ok(models.map((m) => this.getSerializer(m).serialize()));
  }

  public override async retrieve(pk: Pk): Promise<ActionResponse> {
    const model = await this.getModelOr404(pk);
    return ok(this.getSerializer(model).serialize());
  }

  public override async create(): Promise<ActionResponse> {
    const serializer = this.getSerializer();
    if (!serializer.isValid(this.getData())) throw new ValidationError(serializer.errors);
    await serializer.doCreate();
    this.log.debug({ requestId: this.requestId }, "model_created");
    return created(serializer.serialize());
  }

  public override async update(pk: Pk): Promise<ActionResponse> {
    const model = await this.getModelOr404(pk);
    const serializer = this.getSerializer(model);
    if (!serializer.isValid(this.getData(), { partial: true })) {
      throw new ValidationError(serializer.errors);
    }
    await serializer.doUpdate();
    return ok(serializer.serialize());
  }

  public override async destroy(pk: Pk): Promise<ActionResponse> {
    const model = await this.getModelOr404(pk);
    await this.getSerializer(model).doDestroy();
    return noContent();
  }
}

/** list + retrieve only; no write routes are registered. */
export abstract class ReadOnlyModelViewSet<TModel extends object, TDeps = undefined> extends ModelViewSet<
  TModel,
  TDeps
> {
  public static override readonly actions: ReadonlySet<ViewSetAction> = actionSet("list", "retrieve");
}
