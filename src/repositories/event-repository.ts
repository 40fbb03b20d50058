import { randomUUID } from "node:crypto";
import type {
  DetectionEvent,
  EventFeedback,
  NewDetectionEvent,
} from "../shared/interfaces";
import {
  DetectionEvent as DetectionEventModel,
  type DetectionEventDocument,
} from "../models/DetectionEvent";

export interface EventQuery {
  limit?: number;
  eventType?: string;
}

export interface EventRepository {
  insertMany(events: NewDetectionEvent[]): Promise<DetectionEvent[]>;
  /** Ordered by position in the video. */
  listByVideo(videoId: string): Promise<DetectionEvent[]>;
  /** Newest first. */
  listByUser(userId: string, query: EventQuery): Promise<DetectionEvent[]>;
  findById(id: string): Promise<DetectionEvent | null>;
  applyFeedback(id: string, feedback: EventFeedback): Promise<DetectionEvent | null>;
  deleteByVideo(videoId: string): Promise<number>;
}

export function toDetectionEvent(doc: DetectionEventDocument): DetectionEvent {
  return {
    id: doc._id,
    videoId: doc.videoId,
    userId: doc.userId,
    eventType: doc.eventType,
    anomalyScore: doc.anomalyScore,
    confidence: doc.confidence,
    timestampSeconds: doc.timestampSeconds,
    frameNumber: doc.frameNumber,
    description: doc.description,
    isAlert: doc.isAlert,
    isFalsePositive: doc.isFalsePositive ?? null,
    feedbackScore: doc.feedbackScore ?? null,
    feedbackComments: doc.feedbackComments ?? null,
    createdAt: doc.createdAt,
  };
}

export class MongoEventRepository implements EventRepository {
  async insertMany(events: NewDetectionEvent[]): Promise<DetectionEvent[]> {
    if (events.length === 0) return [];
    const docs = await DetectionEventModel.insertMany(
      events.map((event) => ({
        ...event,
        _id: randomUUID(),
        isFalsePositive: null,
        feedbackScore: null,
        feedbackComments: null,
      }))
    );
    return docs.map((doc) => toDetectionEvent(doc.toObject()));
  }

  async listByVideo(videoId: string): Promise<DetectionEvent[]> {
    const docs = await DetectionEventModel.find({ videoId })
      .sort({ timestampSeconds: 1 })
      .lean<DetectionEventDocument[]>();
    return docs.map(toDetectionEvent);
  }

  async listByUser(userId: string, query: EventQuery): Promise<DetectionEvent[]> {
    const filter = query.eventType
      ? { userId, eventType: query.eventType }
      : { userId };
    const cursor = DetectionEventModel.find(filter).sort({ createdAt: -1 });
    if (query.limit !== undefined) cursor.limit(query.limit);
    const docs = await cursor.lean<DetectionEventDocument[]>();
    return docs.map(toDetectionEvent);
  }

  async findById(id: string): Promise<DetectionEvent | null> {
    const doc = await DetectionEventModel.findById(id).lean<DetectionEventDocument>();
    return doc ? toDetectionEvent(doc) : null;
  }

  async applyFeedback(
    id: string,
    feedback: EventFeedback
  ): Promise<DetectionEvent | null> {
    const doc = await DetectionEventModel.findByIdAndUpdate(
      id,
      {
        $set: {
          isFalsePositive: feedback.isFalsePositive,
          feedbackScore: feedback.feedbackScore,
          feedbackComments: feedback.comments ?? null,
        },
      },
      { new: true }
    ).lean<DetectionEventDocument>();
    return doc ? toDetectionEvent(doc) : null;
  }

  async deleteByVideo(videoId: string): Promise<number> {
    const result = await DetectionEventModel.deleteMany({ videoId });
    return result.deletedCount;
  }
}
