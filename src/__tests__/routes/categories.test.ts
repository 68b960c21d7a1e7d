import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { startTestServer, type TestServer } from "../helpers/testServer";

describe("category routes", () => {
  let server: TestServer;
  let headers: { "X-Admin-Token": string };

  beforeEach(async () => {
    server = await startTestServer();
    headers = await server.adminHeaders();
  });

  afterEach(async () => {
    await server.close();
  });

  const createCategory = (body: object) => server.api.post("/api/admin/categories", body, { headers });

  it("lists nothing before any category is created", async () => {
    const res = await server.api.get("/api/categories");

    expect(res.status).toBe(200);
    expect(res.data).toEqual([]);
  });

  it("creates a category and lists it", async () => {
    const created = await createCategory({ name: "Shoes", slug: "shoes" });

    expect(created.status).toBe(201);
    expect(created.data).toEqual({
      id: expect.stringMatching(/^[0-9a-f]{24}$/),
      name: "Shoes",
      slug: "shoes",
      is_active: true,
      created_at: expect.any(String),
    });

    const list = await server.api.get("/api/categories");
    expect(list.data).toEqual([created.data]);
  });

  it("lists the newest category first", async () => {
    await createCategory({ name: "Shoes", slug: "shoes" });
    await createCategory({ name: "Hats", slug: "hats" });

    const list = await server.api.get("/api/categories");
    expect(list.data.map((category: { slug: string }) => category.slug)).toEqual(["hats", "shoes"]);
  });

  it("rejects a duplicate slug", async () => {
    await createCategory({ name: "Shoes", slug: "shoes" });

    const res = await createCategory({ name: "More shoes", slug: "shoes" });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      success: false,
      code: "SLUG_CONFLICT",
      message: "Slug already exists",
      field: "slug",
    });
    expect(server.store.categories.size).toBe(1);
  });

  it("rejects an invalid payload before touching the store", async () => {
    const res = await createCategory({ name: "", slug: "shoes" });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({
      success: false,
      code: "VALIDATION_ERROR",
      message: "name: Name is required",
      field: "name",
    });
    expect(server.store.categories.size).toBe(0);
  });

  it("requires an admin token", async () => {
    const missing = await server.api.post("/api/admin/categories", { name: "Shoes", slug: "shoes" });
    expect(missing.status).toBe(401);
    expect(missing.data).toEqual({ success: false, code: "MISSING_TOKEN", message: "Missing admin token" });

    const garbage = await server.api.post(
      "/api/admin/categories",
      { name: "Shoes", slug: "shoes" },
      { headers: { "X-Admin-Token": "not-a-real-token" } }
    );
    expect(garbage.status).toBe(401);
    expect(garbage.data.code).toBe("INVALID_TOKEN");
  });

  describe("update", () => {
    it("merges the fields sent and stamps updated_at", async () => {
      const created = await createCategory({ name: "Shoes", slug: "shoes" });

      const res = await server.api.put(
        `/api/admin/categories/${created.data.id}`,
        { description: "All footwear" },
        { headers }
      );

      expect(res.status).toBe(200);
      expect(res.data).toEqual({
        ...created.data,
        description: "All footwear",
        updated_at: expect.any(String),
      });
    });

    it("allows keeping the same slug", async () => {
      const created = await createCategory({ name: "Shoes", slug: "shoes" });

      const res = await server.api.put(
        `/api/admin/categories/${created.data.id}`,
        { name: "Footwear", slug: "shoes" },
        { headers }
      );

      expect(res.status).toBe(200);
      expect(res.data.name).toBe("Footwear");
    });

    it("rejects a slug taken by another category", async () => {
      await createCategory({ name: "Shoes", slug: "shoes" });
      const hats = await createCategory({ name: "Hats", slug: "hats" });

      const res = await server.api.put(`/api/admin/categories/${hats.data.id}`, { slug: "shoes" }, { headers });

      expect(res.status).toBe(400);
      expect(res.data.code).toBe("SLUG_CONFLICT");
    });

    it.each(["ffffffffffffffffffffffff", "not-an-id"])(
      "reports an empty update for %s before looking it up",
      async (id) => {
        const res = await server.api.put(`/api/admin/categories/${id}`, { unknown: true }, { headers });

        expect(res.status).toBe(400);
        expect(res.data).toEqual({ success: false, code: "EMPTY_UPDATE", message: "No fields to update" });
      }
    );

    it("returns 404 for an unknown id", async () => {
      const res = await server.api.put(
        "/api/admin/categories/ffffffffffffffffffffffff",
        { name: "Shoes" },
        { headers }
      );

      expect(res.status).toBe(404);
      expect(res.data).toEqual({ success: false, code: "NOT_FOUND", message: "Category not found" });
    });

    it("returns 400 for a malformed id", async () => {
      const res = await server.api.put("/api/admin/categories/not-an-id", { name: "Shoes" }, { headers });

      expect(res.status).toBe(400);
      expect(res.data).toEqual({
        success: false,
        code: "INVALID_IDENTIFIER",
        message: "Invalid id",
        field: "id",
      });
    });
  });

  describe("delete", () => {
    it("succeeds once and then reports not found", async () => {
      const created = await createCategory({ name: "Shoes", slug: "shoes" });

      const first = await server.api.delete(`/api/admin/categories/${created.data.id}`, { headers });
      expect(first.status).toBe(200);
      expect(first.data).toEqual({ success: true });

      const second = await server.api.delete(`/api/admin/categories/${created.data.id}`, { headers });
      expect(second.status).toBe(404);
      expect(second.data.message).toBe("Category not found");
    });

    it("frees the slug for reuse", async () => {
      const created = await createCategory({ name: "Shoes", slug: "shoes" });
      await server.api.delete(`/api/admin/categories/${created.data.id}`, { headers });

      const again = await createCategory({ name: "Shoes", slug: "shoes" });
      expect(again.status).toBe(201);
    });
  });
});
