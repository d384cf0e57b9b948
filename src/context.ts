import { config } from "./config";
import { eventCodec, ticketCodec, userCodec } from "./db/codecs";
import { closeDatabase, Database, openDatabase } from "./db/database";
import { IdAllocator } from "./db/idAllocator";
import { RecordStore } from "./db/recordStore";
import { Clock, systemClock } from "./services/clock";
import { EventService } from "./services/eventService";
import { RelationshipService } from "./services/relationshipService";
import { TicketService } from "./services/ticketService";
import { UserService } from "./services/userService";

export interface AppContext {
  db: Database;
  eventService: EventService;
  userService: UserService;
  ticketService: TicketService;
  relationshipService: RelationshipService;
}

export interface ContextOptions {
  databasePath?: string;
  maxRowBytes?: number;
  now?: Clock;
}

/**
 * Opens the database and wires the stores, the shared id allocator and
 * the services on top of them. Call once at process start and hand the
 * result to `createApp`; release it with `closeContext`.
 */
export async function createContext(options: ContextOptions = {}): Promise<AppContext> {
  const db = await openDatabase(options.databasePath ?? config.databasePath);
  const maxRowBytes = options.maxRowBytes ?? config.maxRowBytes;
  const now = options.now ?? systemClock;

  const ids = new IdAllocator(db);
  const events = new RecordStore(db, eventCodec, maxRowBytes);
  const users = new RecordStore(db, userCodec, maxRowBytes);
  const tickets = new RecordStore(db, ticketCodec, maxRowBytes);

  return {
    db,
    eventService: new EventService(events, ids, now),
    userService: new UserService(users, ids, now),
    ticketService: new TicketService(tickets, ids, now),
    relationshipService: new RelationshipService(tickets, users, events),
  };
}

export async function closeContext(context: AppContext): Promise<void> {
  await closeDatabase(context.db);
}
