import express, { NextFunction, Request, RequestHandler, Response, Router } from "express";
import { Customer, HealthStatus, ServiceInfo } from "@customer-service/types";
import { CustomerRepository, parseCustomerId } from "./customers";
import { customerNotFound, MethodNotAllowedError, UnsupportedMediaTypeError } from "./errors";
import { logger } from "./logger";
import { customerQuerySchema, customerSchema, validate } from "./schemas";

const JSON_TYPE = "application/json";

// Parsed per route so a PUT can answer 404 before looking at its body.
const jsonBody = express.json({ limit: "100kb" });

// Parameters such as "; charset=utf-8" are fine, the media type is not negotiable.
export const requireContentType =
  (expected: string): RequestHandler =>
  (req, _res, next) => {
    const header = req.headers["content-type"];
    if (!header) {
      logger.error("No Content-Type specified.");
      return next(new UnsupportedMediaTypeError(expected));
    }
    const mediaType = header.split(";")[0].trim().toLowerCase();
    if (mediaType !== expected) {
      logger.error(`Invalid Content-Type: ${header}`);
      return next(new UnsupportedMediaTypeError(expected));
    }
    next();
  };

export const methodNotAllowed =
  (allowed: string[], message?: string): RequestHandler =>
  (_req, _res, next) =>
    next(new MethodNotAllowedError(allowed, message));

const baseUrl = (req: Request) => `${req.protocol}://${req.get("host")}`;

export const createRouter = (customers: CustomerRepository): Router => {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({ status: 200, message: "Healthy" } satisfies HealthStatus);
  });

  router
    .route("/")
    .get((req, res) => {
      logger.info("Request for Root URL");
      res.json({
        name: "Customer Service REST API",
        version: "1.0",
        paths: `${baseUrl(req)}/customers`,
      } satisfies ServiceInfo);
    })
    .all(methodNotAllowed(["GET"], "Method not allowed. Please use GET method for this endpoint."));

  // ─── /customers ───────────────────────────────────────────
  router
    .route("/customers")
    .get(async (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = validate(customerQuerySchema, req.query);
        let results: Customer[];

        // First filter present wins; filters are never combined.
        if (query.name) {
          logger.info(`Find by name: ${query.name}`);
          results = await customers.findByName(query.name);
        } else if (query.address) {
          logger.info(`Find by address: ${query.address}`);
          results = await customers.findByAddress(query.address);
        } else if (query.email) {
          logger.info(`Find by email: ${query.email}`);
          results = await customers.findByEmail(query.email);
        } else if (query.phone_number) {
          logger.info(`Find by phone number: ${query.phone_number}`);
          results = await customers.findByPhone(query.phone_number);
        } else if (query.member_since) {
          logger.info(`Find by member_since: ${query.member_since}`);
          results = await customers.findByMemberSince(query.member_since);
        } else if (query.status) {
          logger.info(`Find by status: ${query.status}`);
          results = await customers.findByStatus(query.status);
        } else {
          logger.info("Find all");
          results = await customers.all();
        }

        logger.info(`Returning ${results.length} customers`);
        res.json(results);
      } catch (err) {
        next(err);
      }
    })
    .post(requireContentType(JSON_TYPE), jsonBody, async (req: Request, res: Response, next: NextFunction) => {
      try {
        logger.info("Request to Create a Customer...");
        const input = validate(customerSchema, req.body);
        const customer = await customers.create(input);
        logger.info(`Customer with new id [${customer.id}] saved!`);

        res
          .status(201)
          .location(`${baseUrl(req)}/customers/${customer.id}`)
          .json(customer);
      } catch (err) {
        next(err);
      }
    })
    .all(methodNotAllowed(["GET", "POST"]));

  // ─── /customers/:id ───────────────────────────────────────
  router
    .route("/customers/:id")
    .get(async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = req.params;
        logger.info(`Request to Retrieve a Customer with id [${id}]...`);

        const customerId = parseCustomerId(id);
        const customer = customerId === null ? null : await customers.find(customerId);
        if (!customer) return next(customerNotFound(id));

        res.json(customer);
      } catch (err) {
        next(err);
      }
    })
    .put(
      requireContentType(JSON_TYPE),
      async (req: Request, _res: Response, next: NextFunction) => {
        try {
          const { id } = req.params;
          logger.info(`Request to Update a customer with id [${id}]`);

          const customerId = parseCustomerId(id);
          const existing = customerId === null ? null : await customers.find(customerId);
          next(existing ? undefined : customerNotFound(id));
        } catch (err) {
          next(err);
        }
      },
      jsonBody,
      async (req: Request, res: Response, next: NextFunction) => {
        try {
          const { id } = req.params;
          const input = validate(customerSchema, req.body);
          const customerId = parseCustomerId(id);
          const customer = customerId === null ? null : await customers.update(customerId, input);
          // Deleted between the lookup and the update
          if (!customer) return next(customerNotFound(id));

          logger.info(`Customer with ID: ${customer.id} updated.`);
          res.json(customer);
        } catch (err) {
          next(err);
        }
      },
    )
    .delete(async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = req.params;
        logger.info(`Request to Delete a customer with id [${id}]..`);

        const customerId = parseCustomerId(id);
        if (customerId !== null && (await customers.delete(customerId))) {
          logger.info(`Customer with ID: ${customerId} deleted.`);
        }

        res.status(204).send();
      } catch (err) {
        next(err);
      }
    })
    .all(methodNotAllowed(["GET", "PUT", "DELETE"]));

  // ─── /customers/:id/suspend ───────────────────────────────
  router
    .route("/customers/:id/suspend")
    .put(async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = req.params;
        logger.info(`Request to suspend a customer with id [${id}]..`);

        const customerId = parseCustomerId(id);
        const customer = customerId === null ? null : await customers.setStatus(customerId, "suspended");
        if (!customer) return next(customerNotFound(id));

        res.json(customer);
      } catch (err) {
        next(err);
      }
    })
    .all(methodNotAllowed(["PUT"]));

  return router;
};
