import { IdAllocator } from "../db/idAllocator";
import { RecordStore } from "../db/recordStore";
import { NotFoundError } from "../errors";
import { Ticket, TicketPayload } from "../types";
import { Clock } from "./clock";

/**
 * Ticket CRUD. The referenced event and user are stored as given;
 * neither is checked against its own table.
 */
export class TicketService {
  constructor(
    private readonly tickets: RecordStore<Ticket>,
    private readonly ids: IdAllocator,
    private readonly now: Clock
  ) {}

  async getAllTickets(): Promise<Ticket[]> {
    return this.tickets.getAll();
  }

  async getTicketById(id: number): Promise<Ticket> {
    const ticket = await this.tickets.get(id);
    if (!ticket) {
      throw new NotFoundError("ticket", id);
    }
    return ticket;
  }

  async createTicket(payload: TicketPayload): Promise<Ticket> {
    const ticket: Ticket = {
      id: await this.ids.next(),
      eventId: payload.eventId,
      userId: payload.userId,
      price: payload.price,
      createdAt: this.now(),
      updatedAt: null,
    };

    await this.tickets.insert(ticket);
    return ticket;
  }

  async updateTicket(id: number, payload: TicketPayload): Promise<Ticket> {
    const existing = await this.getTicketById(id);

    const ticket: Ticket = {
      id,
      eventId: payload.eventId,
      userId: payload.userId,
      price: payload.price,
      createdAt: existing.createdAt,
      updatedAt: this.now(),
    };

    if (!(await this.tickets.replace(ticket))) {
      throw new NotFoundError("ticket", id);
    }
    return ticket;
  }

  async deleteTicket(id: number): Promise<Ticket> {
    const removed = await this.tickets.remove(id);
    if (!removed) {
      throw new NotFoundError("ticket", id);
    }
    return removed;
  }
}
