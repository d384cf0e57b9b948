import { IdAllocator } from "../db/idAllocator";
import { RecordStore } from "../db/recordStore";
import { NotFoundError } from "../errors";
import { Event, EventPayload } from "../types";
import { Clock } from "./clock";

export class EventService {
  constructor(
    private readonly events: RecordStore<Event>,
    private readonly ids: IdAllocator,
    private readonly now: Clock
  ) {}

  async getAllEvents(): Promise<Event[]> {
    return this.events.getAll();
  }

  async getEventById(id: number): Promise<Event> {
    const event = await this.events.get(id);
    if (!event) {
      throw new NotFoundError("event", id);
    }
    return event;
  }

  async createEvent(payload: EventPayload): Promise<Event> {
    const event: Event = {
      id: await this.ids.next(),
      name: payload.name,
      description: payload.description,
      date: payload.date,
      startTime: payload.startTime,
      location: payload.location,
      createdAt: this.now(),
      updatedAt: null,
    };

    await this.events.insert(event);
    return event;
  }

  async updateEvent(id: number, payload: EventPayload): Promise<Event> {
    const existing = await this.getEventById(id);

    const event: Event = {
      id,
      name: payload.name,
      description: payload.description,
      date: payload.date,
      startTime: payload.startTime,
      location: payload.location,
      createdAt: existing.createdAt,
      updatedAt: this.now(),
    };

    if (!(await this.events.replace(event))) {
      throw new NotFoundError("event", id);
    }
    return event;
  }

  async deleteEvent(id: number): Promise<Event> {
    const removed = await this.events.remove(id);
    if (!removed) {
      throw new NotFoundError("event", id);
    }
    return removed;
  }
}
