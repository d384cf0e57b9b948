import { RecordStore } from "../db/recordStore";
import { NotFoundError } from "../errors";
import { Event, RemoveUserTicketPayload, Ticket, User } from "../types";

/**
 * Cross-entity queries answered by scanning the ticket table.
 * References are not enforced, so a ticket may point at a user or event
 * that no longer exists. Queries named after a user or an event require
 * that record; the ticket scan for an event does not.
 */
export class RelationshipService {
  constructor(
    private readonly tickets: RecordStore<Ticket>,
    private readonly users: RecordStore<User>,
    private readonly events: RecordStore<Event>
  ) {}

  async getEventTickets(eventId: number): Promise<Ticket[]> {
    const tickets = await this.tickets.getAll();
    return tickets.filter((ticket) => ticket.eventId === eventId);
  }

  async getUserTickets(userId: number): Promise<Ticket[]> {
    if (!(await this.users.get(userId))) {
      throw new NotFoundError("user", userId);
    }

    const tickets = await this.tickets.getAll();
    return tickets.filter((ticket) => ticket.userId === userId);
  }

  /** Distinct ticket holders for an event, in order of their first ticket. Dangling user ids are skipped. */
  async getEventAttendees(eventId: number): Promise<User[]> {
    if (!(await this.events.get(eventId))) {
      throw new NotFoundError("event", eventId);
    }

    const tickets = await this.getEventTickets(eventId);
    const userIds = new Set(tickets.map((ticket) => ticket.userId));

    const attendees: User[] = [];
    for (const userId of userIds) {
      const user = await this.users.get(userId);
      if (user) {
        attendees.push(user);
      }
    }
    return attendees;
  }

  /**
   * Removes the user's lowest-id ticket for the given event.
   * At most one ticket goes per call. The user must exist; the event need not.
   */
  async removeUserTicket(payload: RemoveUserTicketPayload): Promise<Ticket> {
    const { userId, eventId } = payload;
    const owned = await this.getUserTickets(userId);
    const match = owned.find((ticket) => ticket.eventId === eventId);

    const removed = match ? await this.tickets.remove(match.id) : null;
    if (!removed) {
      throw new NotFoundError("ticket", `for user:${userId} event:${eventId}`, {
        userId,
        eventId,
      });
    }
    return removed;
  }
}
