// backend/services/item/src/models/Item.ts

export type Item = {
  id: number;
  name: string;
  dateCreated: Date;
};

export type NewItem = {
  name: string;
  dateCreated?: Date;
};

export type Cat = {
  id: number;
  name: string;
};
