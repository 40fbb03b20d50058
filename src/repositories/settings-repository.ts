import type { UserSettings, UserSettingsRecord } from "../shared/interfaces";
import {
  UserSettingsModel,
  type UserSettingsDocument,
} from "../models/UserSettings";

export interface SettingsRepository {
  findByUser(userId: string): Promise<UserSettings | null>;
  upsert(userId: string, settings: UserSettings): Promise<UserSettings>;
  listAutoDeleteEnabled(): Promise<UserSettingsRecord[]>;
}

function toSettingsRecord(doc: UserSettingsDocument): UserSettingsRecord {
  return {
    userId: doc.userId,
    anomalyThreshold: doc.anomalyThreshold,
    frameSamplingRate: doc.frameSamplingRate,
    autoDeleteOldVideos: doc.autoDeleteOldVideos,
    videoRetentionDays: doc.videoRetentionDays,
  };
}

export class MongoSettingsRepository implements SettingsRepository {
  async findByUser(userId: string): Promise<UserSettings | null> {
    const doc = await UserSettingsModel.findOne({ userId }).lean<UserSettingsDocument>();
    return doc ? toSettingsRecord(doc) : null;
  }

  async upsert(userId: string, settings: UserSettings): Promise<UserSettings> {
    const doc = await UserSettingsModel.findOneAndUpdate(
      { userId },
      { $set: { ...settings, userId } },
      { upsert: true, new: true }
    ).lean<UserSettingsDocument>();
    if (!doc) throw new Error(`Settings upsert returned nothing for ${userId}`);
    return toSettingsRecord(doc);
  }

  async listAutoDeleteEnabled(): Promise<UserSettingsRecord[]> {
    const docs = await UserSettingsModel.find({ autoDeleteOldVideos: true })
      .lean<UserSettingsDocument[]>();
    return docs.map(toSettingsRecord);
  }
}
