import { Schema } from "mongoose";
import { registerModel } from "./register";

export interface UserProfileDocument {
  _id: string;
  email: string;
  fullName: string | null;
  createdAt: Date;
}

const UserProfileSchema = new Schema<UserProfileDocument>(
  {
    _id: { type: String, required: true },
    email: { type: String, required: true, index: true },
    fullName: { type: String, default: null },
    createdAt: { type: Date },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
  }
);

export const UserProfileModel = registerModel<UserProfileDocument>(
  "UserProfile",
  UserProfileSchema
);
