import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { startTestServer, type TestServer } from "../helpers/testServer";

describe("delivery charge routes", () => {
  let server: TestServer;
  let headers: { "X-Admin-Token": string };

  beforeEach(async () => {
    server = await startTestServer();
    headers = await server.adminHeaders();
  });

  afterEach(async () => {
    await server.close();
  });

  const setCharges = (body: object) => server.api.post("/api/admin/delivery", body, { headers });

  it("returns null before any table is set", async () => {
    const res = await server.api.get("/api/delivery");

    expect(res.status).toBe(200);
    expect(res.data).toBeNull();
  });

  it("stores a table with its defaults", async () => {
    const res = await setCharges({
      rates: [
        { location: "Inside City", charge: 60 },
        { location: "Outside City", charge: 120 },
      ],
    });

    expect(res.status).toBe(201);
    expect(res.data).toEqual({
      id: expect.stringMatching(/^[0-9a-f]{24}$/),
      name: "Standard Delivery",
      rates: [
        { location: "Inside City", charge: 60 },
        { location: "Outside City", charge: 120 },
      ],
      created_at: expect.any(String),
    });
  });

  it("serves the most recently set table", async () => {
    const first = await setCharges({ name: "Winter", rates: [{ location: "Inside City", charge: 80 }] });
    const second = await setCharges({ name: "Summer", notes: "Free over 100", rates: [] });

    const res = await server.api.get("/api/delivery");

    expect(res.data).toEqual(second.data);
    expect(res.data.id).not.toBe(first.data.id);
    expect(server.store.deliveryCharges.size).toBe(2);
  });

  it("rejects a negative charge", async () => {
    const res = await setCharges({ rates: [{ location: "Inside City", charge: -1 }] });

    expect(res.status).toBe(400);
    expect(res.data.field).toBe("rates.0.charge");
  });

  it("rejects a charge that overflows to Infinity", async () => {
    const res = await server.api.post("/api/admin/delivery", '{"rates":[{"location":"A","charge":1e999}]}', {
      headers: { ...headers, "Content-Type": "application/json" },
    });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      success: false,
      code: "VALIDATION_ERROR",
      message: "rates.0.charge: Charge must be a finite number",
      field: "rates.0.charge",
    });
    expect(server.store.deliveryCharges.size).toBe(0);
  });

  it("requires an admin token", async () => {
    const res = await server.api.post("/api/admin/delivery", { rates: [] });

    expect(res.status).toBe(401);
    expect(res.data.code).toBe("MISSING_TOKEN");
  });
});
