export type EntityName = "event" | "user" | "ticket";

export interface Event {
  id: number;
  name: string;
  description: string;
  date: string;
  startTime: string;
  location: string;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface User {
  id: number;
  name: string;
  email: string;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface Ticket {
  id: number;
  eventId: number;
  userId: number;
  price: number;
  createdAt: Date;
  updatedAt: Date | null;
}

export type { EventPayload, UserPayload, TicketPayload, RemoveUserTicketPayload } from "./payloads";
