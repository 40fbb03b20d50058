import type { UserProfile } from "../shared/interfaces";
import { UserProfileModel, type UserProfileDocument } from "../models/UserProfile";

export interface ProfileRepository {
  upsert(profile: Omit<UserProfile, "createdAt">): Promise<UserProfile>;
  findById(id: string): Promise<UserProfile | null>;
}

function toUserProfile(doc: UserProfileDocument): UserProfile {
  return {
    id: doc._id,
    email: doc.email,
    fullName: doc.fullName ?? null,
    createdAt: doc.createdAt,
  };
}

export class MongoProfileRepository implements ProfileRepository {
  async upsert(profile: Omit<UserProfile, "createdAt">): Promise<UserProfile> {
    const doc = await UserProfileModel.findOneAndUpdate(
      { _id: profile.id },
      {
        $set: {
          email: profile.email.toLowerCase().trim(),
          fullName: profile.fullName,
        },
      },
      { upsert: true, new: true }
    ).lean<UserProfileDocument>();
    if (!doc) throw new Error(`Profile upsert returned nothing for ${profile.id}`);
    return toUserProfile(doc);
  }

  async findById(id: string): Promise<UserProfile | null> {
    const doc = await UserProfileModel.findById(id).lean<UserProfileDocument>();
    return doc ? toUserProfile(doc) : null;
  }
}
