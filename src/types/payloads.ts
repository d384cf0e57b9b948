import { z } from "zod";

export const IdSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

// Path segments arrive as strings; only plain decimal digits name an id.
export const IdParamSchema = z
  .string()
  .regex(/^\d+$/, "Expected a decimal id")
  .transform(Number)
  .pipe(IdSchema);

export const EventPayloadSchema = z.object({
  name: z.string(),
  description: z.string().default(""),
  date: z.string(),
  startTime: z.string().default(""),
  location: z.string(),
});

export const UserPayloadSchema = z.object({
  name: z.string(),
  email: z.string(),
});

export const TicketPayloadSchema = z.object({
  eventId: IdSchema,
  userId: IdSchema,
  price: z.number().nonnegative(),
});

export const RemoveUserTicketPayloadSchema = TicketPayloadSchema.pick({
  userId: true,
  eventId: true,
});

export type EventPayload = z.output<typeof EventPayloadSchema>;
export type UserPayload = z.output<typeof UserPayloadSchema>;
export type TicketPayload = z.output<typeof TicketPayloadSchema>;
export type RemoveUserTicketPayload = z.output<typeof RemoveUserTicketPayloadSchema>;
