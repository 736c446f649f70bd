import type { Pool } from "pg";
import request from "supertest";
import { Customer, CustomerInput } from "@customer-service/types";
import { createApp } from "./app";
import { CustomerRepository } from "./customers";
import { createMemoryPool, customerInput, resetCustomers } from "../test/memoryDb";

describe("customer routes", () => {
  let pool: Pool;
  let app: ReturnType<typeof createApp>;

  const createCustomer = async (overrides: Partial<CustomerInput> = {}): Promise<Customer> => {
    const res = await request(app).post("/customers").send(customerInput(overrides));
    expect(res.status).toBe(201);
    return res.body;
  };

  beforeAll(() => {
    pool = createMemoryPool();
    app = createApp({ customers: new CustomerRepository(pool) });
  });

  afterAll(async () => {
    await pool.end();
  });

  beforeEach(async () => {
    await resetCustomers(pool);
  });

  describe("service endpoints", () => {
    it("GET / returns service metadata", async () => {
      const res = await request(app).get("/");
      expect(res.status).toBe(200);
      expect(res.body.name).toBe("Customer Service REST API");
      expect(res.body.version).toBe("1.0");
      expect(res.body.paths).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/customers$/);
    });

    it.each(["post", "put", "patch", "delete"] as const)("%s / is not allowed", async (method) => {
      const res = await request(app)[method]("/");
      expect(res.status).toBe(405);
      expect(res.headers.allow).toBe("GET");
      expect(res.body).toEqual({ error: "Method not allowed. Please use GET method for this endpoint." });
    });

    it("GET /health reports liveness", async () => {
      const res = await request(app).get("/health");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 200, message: "Healthy" });
    });

    it("answers unknown paths with a JSON 404", async () => {
      const res = await request(app).get("/orders");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Not Found", message: "Cannot GET /orders" });
    });
  });

  describe("POST /customers", () => {
    it("creates a customer with a Location header", async () => {
      const res = await request(app).post("/customers").send(customerInput());
      expect(res.status).toBe(201);
      expect(res.body).toEqual({ ...customerInput(), id: res.body.id });
      expect(res.headers.location).toMatch(new RegExp(`/customers/${res.body.id}$`));
    });

    it("accepts a charset parameter on the content type", async () => {
      const res = await request(app)
        .post("/customers")
        .set("Content-Type", "application/json; charset=utf-8")
        .send(JSON.stringify(customerInput()));
      expect(res.status).toBe(201);
    });

    it("ignores a client-supplied id", async () => {
      const res = await request(app).post("/customers").send({ ...customerInput(), id: 777 });
      expect(res.status).toBe(201);
      expect(res.body.id).not.toBe(777);
    });

    it("rejects a request without a content type", async () => {
      const res = await request(app).post("/customers");
      expect(res.status).toBe(415);
      expect(res.body).toEqual({
        error: "Unsupported Media Type",
        message: "Content-Type must be application/json",
      });
    });

    it("rejects the wrong content type", async () => {
      const res = await request(app).post("/customers").set("Content-Type", "text/html").send("hello");
      expect(res.status).toBe(415);
    });

    it("rejects an empty body", async () => {
      const res = await request(app).post("/customers").send({});
      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Bad Request");
      expect(res.body.message).toBe("Invalid payload");
      expect(Object.keys(res.body.issues.fieldErrors)).toHaveLength(6);
    });

    it("rejects an invalid member_since", async () => {
      const res = await request(app).post("/customers").send(customerInput({ member_since: "2023-02-30" }));
      expect(res.status).toBe(400);
      expect(Object.keys(res.body.issues.fieldErrors)).toEqual(["member_since"]);
    });

    it("rejects malformed JSON", async () => {
      const res = await request(app).post("/customers").set("Content-Type", "application/json").send("{bad");
      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Bad Request");
    });

    it("names the status of an oversized body", async () => {
      const res = await request(app).post("/customers").send(customerInput({ address: "x".repeat(200_000) }));
      expect(res.status).toBe(413);
      expect(res.body.error).toBe("Payload Too Large");
    });

    it("measures field lengths in characters, not UTF-16 units", async () => {
      const name = "😀".repeat(40);
      const query = jest.fn().mockResolvedValue({ rows: [{ ...customerInput({ name }), id: 1 }] });
      const stubbed = createApp({ customers: new CustomerRepository({ query }) });

      const res = await request(stubbed).post("/customers").send(customerInput({ name }));
      expect(res.status).toBe(201);
      expect(res.body.name).toBe(name);
      expect(query.mock.calls[0][1][0]).toBe(name);
    });
  });

  describe("GET /customers/:id", () => {
    it("reads back exactly what was created", async () => {
      const created = await createCustomer();
      const res = await request(app).get(`/customers/${created.id}`);
      expect(res.status).toBe(200);
      expect(res.body).toEqual(created);
    });

    it("returns 404 for a missing customer", async () => {
      const res = await request(app).get("/customers/0");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Not Found", message: "Customer with id '0' was not found." });
    });

    it("returns 404 for an id that is not a number", async () => {
      const res = await request(app).get("/customers/abc");
      expect(res.status).toBe(404);
    });
  });

  describe("PUT /customers/:id", () => {
    it("changes only the fields that differ", async () => {
      const created = await createCustomer();
      const res = await request(app)
        .put(`/customers/${created.id}`)
        .send({ ...created, name: "Ryan" });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ...created, name: "Ryan" });

      const read = await request(app).get(`/customers/${created.id}`);
      expect(read.body).toEqual({ ...created, name: "Ryan" });
    });

    it("keeps the id even when the body names another", async () => {
      const created = await createCustomer();
      const res = await request(app)
        .put(`/customers/${created.id}`)
        .send({ ...created, id: created.id + 100 });
      expect(res.status).toBe(200);
      expect(res.body.id).toBe(created.id);
    });

    it("returns 404 for a missing customer", async () => {
      const res = await request(app).put("/customers/4242").send(customerInput());
      expect(res.status).toBe(404);
      expect(res.body.message).toBe("Customer with id '4242' was not found.");
    });

    it("checks the content type before looking the customer up", async () => {
      const res = await request(app).put("/customers/4242").set("Content-Type", "text/plain").send("x");
      expect(res.status).toBe(415);
    });

    it("looks the customer up before parsing the body", async () => {
      const res = await request(app).put("/customers/4242").set("Content-Type", "application/json").send("{bad");
      expect(res.status).toBe(404);
      expect(res.body.message).toBe("Customer with id '4242' was not found.");
    });

    it("rejects malformed JSON for an existing customer", async () => {
      const created = await createCustomer();
      const res = await request(app)
        .put(`/customers/${created.id}`)
        .set("Content-Type", "application/json")
        .send("{bad");
      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Bad Request");
    });

    it("rejects an incomplete body", async () => {
      const created = await createCustomer();
      const res = await request(app).put(`/customers/${created.id}`).send({ name: "Only a name" });
      expect(res.status).toBe(400);
    });
  });

  describe("DELETE /customers/:id", () => {
    it("deletes a customer", async () => {
      const created = await createCustomer();
      const res = await request(app).delete(`/customers/${created.id}`);
      expect(res.status).toBe(204);
      expect(res.body).toEqual({});

      const read = await request(app).get(`/customers/${created.id}`);
      expect(read.status).toBe(404);
    });

    it("is idempotent", async () => {
      const created = await createCustomer();
      expect((await request(app).delete(`/customers/${created.id}`)).status).toBe(204);
      expect((await request(app).delete(`/customers/${created.id}`)).status).toBe(204);
    });

    it("succeeds for an id that never existed", async () => {
      expect((await request(app).delete("/customers/0")).status).toBe(204);
      expect((await request(app).delete("/customers/abc")).status).toBe(204);
    });
  });

  describe("GET /customers", () => {
    it("returns an empty list when there are no customers", async () => {
      const res = await request(app).get("/customers");
      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });

    it("lists every customer without filters", async () => {
      for (let i = 0; i < 5; i++) {
        await createCustomer({ name: `Customer ${i}` });
      }
      const res = await request(app).get("/customers");
      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(5);
    });

    describe("filters", () => {
      let ada: Customer;
      let grace: Customer;

      beforeEach(async () => {
        ada = await createCustomer();
        grace = await createCustomer({
          name: "Grace Hopper",
          address: "1 Harbor Way",
          email: "grace@example.com",
          phone_number: "555-0199",
          member_since: "2021-12-09",
          status: "suspended",
        });
      });

      it.each([
        ["name", "Grace Hopper"],
        ["address", "1 Harbor Way"],
        ["email", "grace@example.com"],
        ["phone_number", "555-0199"],
        ["member_since", "2021-12-09"],
        ["status", "suspended"],
      ])("filters by %s", async (param, value) => {
        const res = await request(app).get("/customers").query({ [param]: value });
        expect(res.status).toBe(200);
        expect(res.body).toEqual([grace]);
      });

      it("uses only the first filter given", async () => {
        const res = await request(app).get("/customers").query({ name: ada.name, status: "suspended" });
        expect(res.body).toEqual([ada]);
      });

      it("returns nothing when no record matches", async () => {
        const res = await request(app).get("/customers").query({ email: "nobody@example.com" });
        expect(res.body).toEqual([]);
      });

      it("rejects an invalid member_since", async () => {
        const res = await request(app).get("/customers").query({ member_since: "not-a-date" });
        expect(res.status).toBe(400);
      });

      it("ignores unknown parameters", async () => {
        const res = await request(app).get("/customers").query({ color: "blue" });
        expect(res.body).toEqual([ada, grace]);
      });
    });

    it("does not allow DELETE on the collection", async () => {
      const res = await request(app).delete("/customers");
      expect(res.status).toBe(405);
      expect(res.headers.allow).toBe("GET, POST");
    });
  });

  describe("PUT /customers/:id/suspend", () => {
    it("suspends a customer", async () => {
      const created = await createCustomer();
      const res = await request(app).put(`/customers/${created.id}/suspend`);
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ...created, status: "suspended" });

      const read = await request(app).get(`/customers/${created.id}`);
      expect(read.body.status).toBe("suspended");
    });

    it("returns 404 for a missing customer", async () => {
      const res = await request(app).put("/customers/4242/suspend");
      expect(res.status).toBe(404);
    });

    it("only accepts PUT", async () => {
      const created = await createCustomer();
      const res = await request(app).get(`/customers/${created.id}/suspend`);
      expect(res.status).toBe(405);
      expect(res.headers.allow).toBe("PUT");
    });
  });
});
