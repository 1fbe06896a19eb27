// src/validation.ts
import { z } from "zod";
import { badRequest, type DomainError } from "./errors.js";
import { SORT_FIELDS, SORT_ORDERS, type SearchCriteria } from "./types.js";

export interface Violation {
  field: string;
  message: string;
}

export const MAX_PAGE_SIZE = 100;

const PAIR_MESSAGE = "Both page and size must be provided together";

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

/**
 * Cross-field validation for post search criteria.
 * Rules are independent; every violation is reported, none short-circuits.
 */
export function validateSearchCriteria(criteria: SearchCriteria): Violation[] {
  const violations: Violation[] = [];

  if (criteria.userId !== undefined && !isPositiveInteger(criteria.userId)) {
    violations.push({ field: "userId", message: "User id must be a positive integer" });
  }

  const hasPage = criteria.page !== undefined;
  const hasSize = criteria.size !== undefined;
  if (hasPage !== hasSize) {
    violations.push({ field: hasPage ? "size" : "page", message: PAIR_MESSAGE });
  }
  if (criteria.page !== undefined && !isPositiveInteger(criteria.page)) {
    violations.push({ field: "page", message: "Page number must be at least 1" });
  }
  if (criteria.size !== undefined && (!isPositiveInteger(criteria.size) || criteria.size > MAX_PAGE_SIZE)) {
    violations.push({ field: "size", message: `Page size must be between 1 and ${MAX_PAGE_SIZE}` });
  }

  if (criteria.sort !== undefined && !SORT_FIELDS.some((f) => f === criteria.sort)) {
    violations.push({ field: "sort", message: `Sort field must be one of: ${SORT_FIELDS.join(", ")}` });
  }

  if (criteria.order !== undefined) {
    const order = criteria.order.toLowerCase();
    if (!SORT_ORDERS.some((o) => o === order)) {
      violations.push({ field: "order", message: "Order must be 'asc' or 'desc'" });
    }
    if (criteria.sort === undefined) {
      violations.push({ field: "sort", message: "Sort field is required when order is specified" });
    }
  }

  return violations;
}

export function formatViolations(violations: readonly Violation[]): string {
  return violations.map((v) => `${v.field}: ${v.message}`).join("; ");
}

export function validationError(violations: readonly Violation[]): DomainError {
  return badRequest(formatViolations(violations));
}

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

// Plain decimal digits within the 32-bit range; no hex, exponents or fractions.
const integerParam = (field: string) =>
  z.string().transform((raw, ctx) => {
    const trimmed = raw.trim();
    const value = Number(trimmed);
    if (!/^-?\d+$/.test(trimmed) || value < INT32_MIN || value > INT32_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `'${raw}' is not a valid value for '${field}'. Please provide a valid number.`,
      });
      return z.NEVER;
    }
    return value;
  });

const searchQuerySchema = z.object({
  userId: integerParam("userId").optional(),
  titleContains: z.string().optional(),
  page: integerParam("page").optional(),
  size: integerParam("size").optional(),
  sort: z.string().optional(),
  order: z.string().optional(),
});

export type ParseResult =
  | { ok: true; criteria: SearchCriteria }
  | { ok: false; violations: Violation[] };

function typeViolations(error: z.ZodError): Violation[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "query",
    message: issue.message,
  }));
}

/**
 * Bind raw query-string values into SearchCriteria and validate them.
 * Values that fail to bind are reported, then the cross-field rules run on
 * the fields that did bind; a rule is skipped for a field that already has
 * a binding violation.
 */
export function parseSearchCriteria(query: Record<string, unknown>): ParseResult {
  const parsed = searchQuerySchema.safeParse(query);
  if (parsed.success) {
    const violations = validateSearchCriteria(parsed.data);
    if (violations.length > 0) return { ok: false, violations };
    const criteria: SearchCriteria = Object.freeze({ ...parsed.data });
    return { ok: true, criteria };
  }

  const bindViolations = typeViolations(parsed.error);
  const unbound = new Set(bindViolations.map((v) => v.field));
  const bound = searchQuerySchema.safeParse(
    Object.fromEntries(Object.entries(query).filter(([key]) => !unbound.has(key)))
  );
  const ruleViolations = bound.success
    ? validateSearchCriteria(bound.data).filter((v) => !unbound.has(v.field))
    : [];

  return { ok: false, violations: [...bindViolations, ...ruleViolations] };
}
