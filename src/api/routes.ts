import { Router, Request, Response, NextFunction, RequestHandler } from "express";
import { AppContext } from "../context";
import {
  EventPayloadSchema,
  IdParamSchema,
  TicketPayloadSchema,
  UserPayloadSchema,
} from "../types/payloads";

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware.
const route =
  (handler: AsyncRoute): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

const idParam = (req: Request, name = "id") => IdParamSchema.parse(req.params[name]);

export function createRouter(context: AppContext): Router {
  const { eventService, userService, ticketService, relationshipService } = context;
  const router = Router();

  router.get("/", (req, res) => {
    res.json({
      version: "1.0.0",
      status: "current",
      endpoints: {
        events: {
          list: "GET    /api/v1/events",
          get: "GET    /api/v1/events/:id",
          create: "POST   /api/v1/events",
          update: "PUT    /api/v1/events/:id",
          delete: "DELETE /api/v1/events/:id",
          tickets: "GET    /api/v1/events/:id/tickets",
          attendees: "GET    /api/v1/events/:id/attendees",
        },
        users: {
          list: "GET    /api/v1/users",
          get: "GET    /api/v1/users/:id",
          create: "POST   /api/v1/users",
          update: "PUT    /api/v1/users/:id",
          delete: "DELETE /api/v1/users/:id",
          tickets: "GET    /api/v1/users/:id/tickets",
          removeTicket: "DELETE /api/v1/users/:userId/events/:eventId/ticket",
        },
        tickets: {
          list: "GET    /api/v1/tickets",
          get: "GET    /api/v1/tickets/:id",
          create: "POST   /api/v1/tickets",
          update: "PUT    /api/v1/tickets/:id",
          delete: "DELETE /api/v1/tickets/:id",
        },
      },
    });
  });

  // Event Routes
  router.get(
    "/events",
    route(async (req, res) => {
      res.json(await eventService.getAllEvents());
    })
  );

  router.get(
    "/events/:id",
    route(async (req, res) => {
      res.json(await eventService.getEventById(idParam(req)));
    })
  );

  router.post(
    "/events",
    route(async (req, res) => {
      const event = await eventService.createEvent(EventPayloadSchema.parse(req.body));
      res.status(201).json(event);
    })
  );

  router.put(
    "/events/:id",
    route(async (req, res) => {
      const id = idParam(req);
      res.json(await eventService.updateEvent(id, EventPayloadSchema.parse(req.body)));
    })
  );

  router.delete(
    "/events/:id",
    route(async (req, res) => {
      res.json(await eventService.deleteEvent(idParam(req)));
    })
  );

  router.get(
    "/events/:id/tickets",
    route(async (req, res) => {
      res.json(await relationshipService.getEventTickets(idParam(req)));
    })
  );

  router.get(
    "/events/:id/attendees",
    route(async (req, res) => {
      res.json(await relationshipService.getEventAttendees(idParam(req)));
    })
  );

  // User Routes
  router.get(
    "/users",
    route(async (req, res) => {
      res.json(await userService.getAllUsers());
    })
  );

  router.get(
    "/users/:id",
    route(async (req, res) => {
      res.json(await userService.getUserById(idParam(req)));
    })
  );

  router.post(
    "/users",
    route(async (req, res) => {
      const user = await userService.createUser(UserPayloadSchema.parse(req.body));
      res.status(201).json(user);
    })
  );

  router.put(
    "/users/:id",
    route(async (req, res) => {
      const id = idParam(req);
      res.json(await userService.updateUser(id, UserPayloadSchema.parse(req.body)));
    })
  );

  router.delete(
    "/users/:id",
    route(async (req, res) => {
      res.json(await userService.deleteUser(idParam(req)));
    })
  );

  router.get(
    "/users/:id/tickets",
    route(async (req, res) => {
      res.json(await relationshipService.getUserTickets(idParam(req)));
    })
  );

  router.delete(
    "/users/:userId/events/:eventId/ticket",
    route(async (req, res) => {
      const ticket = await relationshipService.removeUserTicket({
        userId: idParam(req, "userId"),
        eventId: idParam(req, "eventId"),
      });
      res.json(ticket);
    })
  );

  // Ticket Routes
  router.get(
    "/tickets",
    route(async (req, res) => {
      res.json(await ticketService.getAllTickets());
    })
  );

  router.get(
    "/tickets/:id",
    route(async (req, res) => {
      res.json(await ticketService.getTicketById(idParam(req)));
    })
  );

  router.post(
    "/tickets",
    route(async (req, res) => {
      const ticket = await ticketService.createTicket(TicketPayloadSchema.parse(req.body));
      res.status(201).json(ticket);
    })
  );

  router.put(
    "/tickets/:id",
    route(async (req, res) => {
      const id = idParam(req);
      res.json(await ticketService.updateTicket(id, TicketPayloadSchema.parse(req.body)));
    })
  );

  router.delete(
    "/tickets/:id",
    route(async (req, res) => {
      res.json(await ticketService.deleteTicket(idParam(req)));
    })
  );

  // Health check
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date() });
  });

  return router;
}
