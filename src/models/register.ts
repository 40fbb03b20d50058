import mongoose, { type Model, type Schema } from "mongoose";

export function registerModel<T>(name: string, schema: Schema<T>): Model<T> {
  const existing: Model<T> | undefined = mongoose.models[name];
  return existing ?? mongoose.model<T>(name, schema);
}
