import { z } from "zod";
import { Event, Ticket, User } from "../types";
import { SqlValue } from "./database";

/** Maps one entity onto the typed columns of its table. */
export interface RowCodec<T extends { id: number }, C extends string> {
  readonly table: string;
  readonly columns: readonly ("id" | C)[];
  toRow(record: T): Record<"id" | C, SqlValue>;
  fromRow(row: unknown): T;
}

const Timestamp = z.string().transform((value) => new Date(value));
const NullableTimestamp = z
  .string()
  .nullable()
  .transform((value) => (value === null ? null : new Date(value)));

const EventRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string(),
  date: z.string(),
  startTime: z.string(),
  location: z.string(),
  createdAt: Timestamp,
  updatedAt: NullableTimestamp,
});

const UserRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  email: z.string(),
  createdAt: Timestamp,
  updatedAt: NullableTimestamp,
});

const TicketRowSchema = z.object({
  id: z.number().int(),
  eventId: z.number().int(),
  userId: z.number().int(),
  price: z.number(),
  createdAt: Timestamp,
  updatedAt: NullableTimestamp,
});

export const eventCodec: RowCodec<
  Event,
  "name" | "description" | "date" | "startTime" | "location" | "createdAt" | "updatedAt"
> = {
  table: "events",
  columns: ["id", "name", "description", "date", "startTime", "location", "createdAt", "updatedAt"],
  toRow: (event) => ({
    id: event.id,
    name: event.name,
    description: event.description,
    date: event.date,
    startTime: event.startTime,
    location: event.location,
    createdAt: event.createdAt.toISOString(),
    updatedAt: event.updatedAt?.toISOString() ?? null,
  }),
  fromRow: (row) => EventRowSchema.parse(row),
};

export const userCodec: RowCodec<User, "name" | "email" | "createdAt" | "updatedAt"> = {
  table: "users",
  columns: ["id", "name", "email", "createdAt", "updatedAt"],
  toRow: (user) => ({
    id: user.id,
    name: user.name,
    email: user.email,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt?.toISOString() ?? null,
  }),
  fromRow: (row) => UserRowSchema.parse(row),
};

export const ticketCodec: RowCodec<
  Ticket,
  "eventId" | "userId" | "price" | "createdAt" | "updatedAt"
> = {
  table: "tickets",
  columns: ["id", "eventId", "userId", "price", "createdAt", "updatedAt"],
  toRow: (ticket) => ({
    id: ticket.id,
    eventId: ticket.eventId,
    userId: ticket.userId,
    price: ticket.price,
    createdAt: ticket.createdAt.toISOString(),
    updatedAt: ticket.updatedAt?.toISOString() ?? null,
  }),
  fromRow: (row) => TicketRowSchema.parse(row),
};
