import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { once } from "events";
import { Server } from "http";
import { createApp } from "./app";
import { AppContext, closeContext, createContext } from "./context";

const NOW_ISO = "2025-03-01T10:00:00.000Z";

describe("HTTP API", () => {
  let context: AppContext;
  let server: Server;
  let origin: string;

  beforeEach(async () => {
    context = await createContext({
      databasePath: ":memory:",
      maxRowBytes: 256,
      now: () => new Date(NOW_ISO),
    });
    server = createApp(context).listen(0, "127.0.0.1");
    await once(server, "listening");

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server has no TCP address");
    }
    origin = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await closeContext(context);
  });

  const call = (method: string, path: string, body?: unknown) =>
    fetch(`${origin}/api/v1${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  const expo = { name: "Expo", date: "2025-06-01", location: "Hall A" };

  describe("events", () => {
    it("POST creates with defaults for optional fields and GET reads it back", async () => {
      const created = await call("POST", "/events", expo);
      expect(created.status).toBe(201);
      const body = await created.json();
      expect(body).toEqual({
        id: 0,
        name: "Expo",
        description: "",
        date: "2025-06-01",
        startTime: "",
        location: "Hall A",
        createdAt: NOW_ISO,
        updatedAt: null,
      });

      const fetched = await call("GET", "/events/0");
      expect(fetched.status).toBe(200);
      expect(await fetched.json()).toEqual(body);
    });

    it("PUT updates and stamps updatedAt", async () => {
      await call("POST", "/events", expo);

      const res = await call("PUT", "/events/0", { ...expo, name: "Expo 2" });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        id: 0,
        name: "Expo 2",
        createdAt: NOW_ISO,
        updatedAt: NOW_ISO,
      });
    });

    it("DELETE returns the removed event, then 404", async () => {
      await call("POST", "/events", expo);

      const first = await call("DELETE", "/events/0");
      expect(first.status).toBe(200);
      expect(await first.json()).toMatchObject({ id: 0, name: "Expo" });

      const second = await call("DELETE", "/events/0");
      expect(second.status).toBe(404);
    });

    it("answers a missing event with the standard error body", async () => {
      const res = await call("GET", "/events/99");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: "NOT_FOUND", message: "event id:99 does not exist" },
      });
    });

    it("rejects a payload missing a required field", async () => {
      const res = await call("POST", "/events", { date: "2025-06-01", location: "Hall A" });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        error: {
          code: "INVALID_INPUT",
          details: { issues: [{ path: "name", message: "Required" }] },
        },
      });
    });

    it.each(["abc", "1e3", "0x10", "%207", "-1", "1.5"])(
      "rejects the path id %s",
      async (id) => {
        await call("POST", "/events", expo);

        const res = await call("GET", `/events/${id}`);

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ error: { code: "INVALID_INPUT" } });
      }
    );

    it("rejects a row over the size bound with 413", async () => {
      const res = await call("POST", "/events", { ...expo, description: "x".repeat(300) });

      expect(res.status).toBe(413);
      expect(await res.json()).toMatchObject({ error: { code: "RECORD_TOO_LARGE" } });
      expect(await (await call("GET", "/events")).json()).toEqual([]);
    });
  });

  describe("relationships", () => {
    it("lists tickets and attendees of an event and the tickets of a user", async () => {
      await call("POST", "/events", expo);
      await call("POST", "/users", { name: "Ann", email: "ann@example.com" });
      await call("POST", "/tickets", { eventId: 0, userId: 1, price: 10 });
      await call("POST", "/tickets", { eventId: 0, userId: 1, price: 12 });

      const tickets = await (await call("GET", "/events/0/tickets")).json();
      expect(tickets).toMatchObject([{ id: 2 }, { id: 3 }]);

      const attendees = await (await call("GET", "/events/0/attendees")).json();
      expect(attendees).toEqual([
        { id: 1, name: "Ann", email: "ann@example.com", createdAt: NOW_ISO, updatedAt: null },
      ]);

      const owned = await (await call("GET", "/users/1/tickets")).json();
      expect(owned).toMatchObject([{ price: 10 }, { price: 12 }]);
    });

    it("removes one ticket of a user for an event, then 404 once none are left", async () => {
      await call("POST", "/users", { name: "Ann", email: "ann@example.com" });
      await call("POST", "/tickets", { eventId: 5, userId: 0, price: 10 });

      const removed = await call("DELETE", "/users/0/events/5/ticket");
      expect(removed.status).toBe(200);
      expect(await removed.json()).toMatchObject({ id: 1, eventId: 5, userId: 0 });

      const again = await call("DELETE", "/users/0/events/5/ticket");
      expect(again.status).toBe(404);
      expect(await again.json()).toMatchObject({
        error: { message: "ticket for user:0 event:5 does not exist" },
      });
    });

    it("answers 404 for the tickets of an unknown user", async () => {
      const res = await call("GET", "/users/4/tickets");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: "NOT_FOUND", message: "user id:4 does not exist" },
      });
    });
  });

  describe("plumbing", () => {
    it("echoes the caller's request id", async () => {
      const res = await fetch(`${origin}/api/v1/health`, {
        headers: { "X-Request-Id": "req-123" },
      });

      expect(res.status).toBe(200);
      expect(res.headers.get("x-request-id")).toBe("req-123");
    });

    it("answers malformed JSON with 400", async () => {
      const res = await fetch(`${origin}/api/v1/users`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: "INVALID_INPUT", message: "Malformed JSON body" },
      });
    });

    it("answers an oversized body with 413", async () => {
      const res = await call("POST", "/events", { ...expo, description: "x".repeat(200_000) });

      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: "PAYLOAD_TOO_LARGE", message: "request entity too large" },
      });
    });

    it("answers an unsupported body charset with 415", async () => {
      const res = await fetch(`${origin}/api/v1/users`, {
        method: "POST",
        headers: { "Content-Type": "application/json; charset=latin1" },
        body: JSON.stringify({ name: "Ann", email: "ann@example.com" }),
      });

      expect(res.status).toBe(415);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: "UNSUPPORTED_MEDIA_TYPE", message: 'unsupported charset "LATIN1"' },
      });
    });

    it("redirects /api to the current version", async () => {
      const res = await fetch(`${origin}/api`, { redirect: "manual" });

      expect(res.status).toBe(302);
      expect(res.headers.get("location")).toBe("/api/v1");
    });

    it("answers unknown routes with 404", async () => {
      const res = await fetch(`${origin}/nowhere`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: {
          code: "NOT_FOUND",
          message: "Endpoint not found",
          details: { availableVersions: ["/api/v1"] },
        },
      });
    });
  });
});
