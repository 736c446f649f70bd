import { CustomerInput } from "@customer-service/types";

// ─── Sample Data ──────────────────────────────────────────
const FIRST_NAMES = [
  "James", "Mary", "John", "Patricia", "Robert", "Jennifer", "Priya",
  "Ravi", "Chen", "Wei", "Yuki", "Hana", "Carlos", "Sofia", "Ahmed", "Zara",
];

const LAST_NAMES = [
  "Smith", "Johnson", "Garcia", "Miller", "Lopez", "Wilson", "Patel",
  "Kumar", "Singh", "Chen", "Wang", "Kim", "Tanaka", "Silva", "Schmidt", "Moore",
];

const STREETS = ["Main St", "Oak Ave", "Maple Rd", "Cedar Ln", "Elm St", "Harbor Way"];

const CITIES = ["Springfield", "Riverton", "Lakeside", "Fairview", "Greenville"];

const STATUSES = ["active", "active", "active", "inactive", "suspended"];

export type Random = () => number;

const pick = <T>(items: readonly T[], random: Random): T =>
  items[Math.floor(random() * items.length)];

const pad = (n: number, width: number) => String(n).padStart(width, "0");

/**
 * Builds one plausible customer. `index` keeps emails and phone numbers
 * unique across a seeding run.
 */
export const generateCustomer = (index: number, random: Random = Math.random): CustomerInput => {
  const firstName = pick(FIRST_NAMES, random);
  const lastName = pick(LAST_NAMES, random);

  const year = 2015 + Math.floor(random() * 10);
  const month = 1 + Math.floor(random() * 12);
  const day = 1 + Math.floor(random() * 28); // valid in every month

  return {
    name: `${firstName} ${lastName}`,
    address: `${1 + Math.floor(random() * 999)} ${pick(STREETS, random)}, ${pick(CITIES, random)}`,
    email: `${firstName.toLowerCase()}.${lastName.toLowerCase()}${index}@example.com`,
    phone_number: `555-${pad(index % 10_000, 4)}`,
    member_since: `${year}-${pad(month, 2)}-${pad(day, 2)}`,
    status: pick(STATUSES, random),
  };
};

/**
 * One multi-row INSERT for a batch:
 * VALUES ($1, ..., $6), ($7, ..., $12), ...
 */
export const buildInsert = (customers: CustomerInput[]): { text: string; values: string[] } => {
  const placeholders: string[] = [];
  const values: string[] = [];

  customers.forEach((c, i) => {
    const base = i * 6;
    placeholders.push(`(${[1, 2, 3, 4, 5, 6].map((n) => `$${base + n}`).join(", ")})`);
    values.push(c.name, c.address, c.email, c.phone_number, c.member_since, c.status);
  });

  return {
    text: `INSERT INTO customers (name, address, email, phone_number, member_since, status)
     VALUES ${placeholders.join(", ")}`,
    values,
  };
};
