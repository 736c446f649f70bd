import { Pool } from "pg";
import { Customer, CustomerFilter, CustomerInput } from "@customer-service/types";

interface CustomerRow {
  id: number;
  name: string;
  address: string;
  email: string;
  phone_number: string;
  member_since: string | Date;
  status: string;
}

const COLUMNS = "id, name, address, email, phone_number, member_since, status";

// SERIAL is a 32-bit column; anything outside it cannot name a row.
const MAX_ID = 2_147_483_647;

/** Parses a path segment into a customer id, or null when it can never match a row. */
export const parseCustomerId = (raw: string): number | null => {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return id >= 1 && id <= MAX_ID ? id : null;
};

const toIsoDate = (value: string | Date): string =>
  typeof value === "string" ? value.slice(0, 10) : value.toISOString().slice(0, 10);

export const serialize = (row: CustomerRow): Customer => ({
  id: row.id,
  name: row.name,
  address: row.address,
  email: row.email,
  phone_number: row.phone_number,
  member_since: toIsoDate(row.member_since),
  status: row.status,
});

// ─── Customer Repository ──────────────────────────────────
// One query per call; the database's own isolation covers concurrent requests.
export class CustomerRepository {
  constructor(private readonly pool: Pick<Pool, "query">) {}

  async create(input: CustomerInput): Promise<Customer> {
    const { rows } = await this.pool.query<CustomerRow>(
      `INSERT INTO customers (name, address, email, phone_number, member_since, status)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${COLUMNS}`,
      [input.name, input.address, input.email, input.phone_number, input.member_since, input.status],
    );
    return serialize(rows[0]);
  }

  /** Replaces every column but the id. Resolves null when the row is gone. */
  async update(id: number, input: CustomerInput): Promise<Customer | null> {
    const { rows } = await this.pool.query<CustomerRow>(
      `UPDATE customers
       SET name=$1, address=$2, email=$3, phone_number=$4, member_since=$5, status=$6
       WHERE id=$7
       RETURNING ${COLUMNS}`,
      [input.name, input.address, input.email, input.phone_number, input.member_since, input.status, id],
    );
    return rows.length ? serialize(rows[0]) : null;
  }

  async setStatus(id: number, status: string): Promise<Customer | null> {
    const { rows } = await this.pool.query<CustomerRow>(
      `UPDATE customers SET status=$1 WHERE id=$2 RETURNING ${COLUMNS}`,
      [status, id],
    );
    return rows.length ? serialize(rows[0]) : null;
  }

  /** Returns whether a row was removed; removing a missing id is not an error. */
  async delete(id: number): Promise<boolean> {
    const { rowCount } = await this.pool.query("DELETE FROM customers WHERE id=$1", [id]);
    return Boolean(rowCount);
  }

  async find(id: number): Promise<Customer | null> {
    const { rows } = await this.pool.query<CustomerRow>(
      `SELECT ${COLUMNS} FROM customers WHERE id=$1`,
      [id],
    );
    return rows.length ? serialize(rows[0]) : null;
  }

  async all(): Promise<Customer[]> {
    const { rows } = await this.pool.query<CustomerRow>(
      `SELECT ${COLUMNS} FROM customers ORDER BY id ASC`,
    );
    return rows.map(serialize);
  }

  findByName(name: string) {
    return this.findBy("name", name);
  }

  findByAddress(address: string) {
    return this.findBy("address", address);
  }

  findByEmail(email: string) {
    return this.findBy("email", email);
  }

  findByPhone(phoneNumber: string) {
    return this.findBy("phone_number", phoneNumber);
  }

  findByMemberSince(date: string) {
    return this.findBy("member_since", date);
  }

  findByStatus(status: string) {
    return this.findBy("status", status);
  }

  // `column` is a CustomerFilter literal, never user input.
  async findBy(column: CustomerFilter, value: string): Promise<Customer[]> {
    const { rows } = await this.pool.query<CustomerRow>(
      `SELECT ${COLUMNS} FROM customers WHERE ${column}=$1 ORDER BY id ASC`,
      [value],
    );
    return rows.map(serialize);
  }
}
