import type {
  MediaFacts,
  NewVideo,
  VideoRecord,
  VideoStatus,
} from "../shared/interfaces";
import { Video, type VideoDocument } from "../models/Video";

export interface StatusPatch extends MediaFacts {
  errorMessage?: string | null;
}

export interface VideoRepository {
  create(input: NewVideo): Promise<VideoRecord>;
  findById(id: string): Promise<VideoRecord | null>;
  /** Newest first. */
  listByUser(userId: string, limit?: number): Promise<VideoRecord[]>;
  listCreatedBefore(userId: string, cutoff: Date): Promise<VideoRecord[]>;
  countByStatus(status: VideoStatus, userId?: string): Promise<number>;
  /**
   * Moves a video to `to` only while its current status is one of `from`.
   * Resolves to null when the video is missing or in another status.
   */
  transitionStatus(
    id: string,
    from: readonly VideoStatus[],
    to: VideoStatus,
    patch?: StatusPatch
  ): Promise<VideoRecord | null>;
  delete(id: string): Promise<boolean>;
}

export function toVideoRecord(doc: VideoDocument): VideoRecord {
  return {
    id: doc._id,
    userId: doc.userId,
    filename: doc.filename,
    originalName: doc.originalName,
    filePath: doc.filePath,
    fileUrl: doc.fileUrl ?? null,
    fileSize: doc.fileSize,
    durationSeconds: doc.durationSeconds ?? null,
    fps: doc.fps ?? null,
    resolution: doc.resolution ?? null,
    status: doc.status,
    storageProvider: doc.storageProvider,
    errorMessage: doc.errorMessage ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function patchFields(patch: StatusPatch): Partial<VideoDocument> {
  const fields: Partial<VideoDocument> = {};
  if (patch.durationSeconds !== undefined) fields.durationSeconds = patch.durationSeconds;
  if (patch.fps !== undefined) fields.fps = patch.fps;
  if (patch.resolution !== undefined) fields.resolution = patch.resolution;
  if (patch.errorMessage !== undefined) fields.errorMessage = patch.errorMessage;
  return fields;
}

export class MongoVideoRepository implements VideoRepository {
  async create(input: NewVideo): Promise<VideoRecord> {
    const { id, ...rest } = input;
    const created = await Video.create({
      ...rest,
      _id: id,
      status: input.status ?? "uploaded",
      errorMessage: null,
    });
    return toVideoRecord(created.toObject());
  }

  async findById(id: string): Promise<VideoRecord | null> {
    const doc = await Video.findById(id).lean<VideoDocument>();
    return doc ? toVideoRecord(doc) : null;
  }

  async listByUser(userId: string, limit?: number): Promise<VideoRecord[]> {
    const query = Video.find({ userId }).sort({ createdAt: -1 });
    if (limit !== undefined) query.limit(limit);
    const docs = await query.lean<VideoDocument[]>();
    return docs.map(toVideoRecord);
  }

  async listCreatedBefore(userId: string, cutoff: Date): Promise<VideoRecord[]> {
    const docs = await Video.find({ userId, createdAt: { $lt: cutoff } })
      .sort({ createdAt: 1 })
      .lean<VideoDocument[]>();
    return docs.map(toVideoRecord);
  }

  async countByStatus(status: VideoStatus, userId?: string): Promise<number> {
    return await Video.countDocuments(userId ? { status, userId } : { status });
  }

  async transitionStatus(
    id: string,
    from: readonly VideoStatus[],
    to: VideoStatus,
    patch: StatusPatch = {}
  ): Promise<VideoRecord | null> {
    const doc = await Video.findOneAndUpdate(
      { _id: id, status: { $in: [...from] } },
      { $set: { ...patchFields(patch), status: to } },
      { new: true }
    ).lean<VideoDocument>();
    return doc ? toVideoRecord(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await Video.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }
}
