import type { DetectionEvent, EventFeedback } from "../shared/interfaces";
import type { EventQuery, EventRepository } from "../repositories/event-repository";
import type { ServiceLogger } from "../shared/logger";
import { BadRequestError, ForbiddenError, NotFoundError } from "../shared/errors";

export class EventService {
  constructor(
    private readonly events: EventRepository,
    private readonly logger: ServiceLogger
  ) {}

  async list(userId: string, query: EventQuery): Promise<DetectionEvent[]> {
    return this.events.listByUser(userId, query);
  }

  async submitFeedback(
    userId: string,
    eventId: string,
    feedback: EventFeedback
  ): Promise<DetectionEvent> {
    if (!(feedback.feedbackScore >= -1 && feedback.feedbackScore <= 1)) {
      throw new BadRequestError("feedback_score must be between -1 and 1");
    }

    const event = await this.events.findById(eventId);
    if (!event) throw new NotFoundError("Event not found");
    if (event.userId !== userId) throw new ForbiddenError();

    const updated = await this.events.applyFeedback(eventId, feedback);
    if (!updated) throw new NotFoundError("Event not found");

    this.logger.info("Event feedback recorded", {
      eventId,
      userId,
      isFalsePositive: feedback.isFalsePositive,
    });
    return updated;
  }
}
