import dotenv from "dotenv";
import { z } from "zod";
import { storeDrivers } from "../utils/constants.js";

dotenv.config();

const emptyToUndefined = <T>(schema: z.ZodType<T>) =>
  z.preprocess((value) => {
    if (typeof value === "string" && value.trim().length === 0)
      return undefined;
    return value;
  }, schema);

// z.coerce.boolean() would read "false" as true.
const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const schema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    PORT: z.coerce.number().int().positive().default(4000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: emptyToUndefined(
      z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
    ),
    STORE_DRIVER: z.enum(storeDrivers).default("mongo"),
    MONGODB_URI: emptyToUndefined(z.string().min(1).optional()),
    MONGODB_DB_NAME: z.string().min(1).default("ledger"),
    MONGO_ALLOW_NON_TRANSACTIONAL: flag(false),
    ALLOWED_ORIGINS: z.string().min(1).default("http://localhost:3000"),
    TAX_RATE: z
      .string()
      .regex(/^(0(\.\d{1,4})?|1(\.0{1,4})?)$/, "TAX_RATE must be a decimal between 0 and 1 with at most 4 places")
      .default("0.13"),
    INVOICE_NUMBER_PREFIX: z
      .string()
      .regex(/^[A-Z0-9]{1,10}$/, "INVOICE_NUMBER_PREFIX must be 1-10 uppercase letters or digits")
      .default("INV"),
    ALLOW_TRANSACTION_CASCADE_DELETE: flag(false),
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(200),
    // "true", or a comma-separated list of proxy addresses/CIDRs
    TRUST_PROXY: emptyToUndefined(z.string().optional()),
  })
  .superRefine((value, ctx) => {
    if (value.STORE_DRIVER === "mongo" && !value.MONGODB_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MONGODB_URI"],
        message: "MONGODB_URI is required when STORE_DRIVER=mongo",
      });
    }
    if (value.NODE_ENV === "production" && value.MONGO_ALLOW_NON_TRANSACTIONAL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MONGO_ALLOW_NON_TRANSACTIONAL"],
        message: "Non-transactional writes are not allowed in production",
      });
    }
  });

export type Env = z.infer<typeof schema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }
  return parsed.data;
}

export function resolveLogLevel(config: Pick<Env, "LOG_LEVEL" | "NODE_ENV">): string {
  if (config.LOG_LEVEL) return config.LOG_LEVEL;
  if (config.NODE_ENV === "production") return "info";
  if (config.NODE_ENV === "test") return "silent";
  return "debug";
}

export function resolveTrustProxy(value: string | undefined): boolean | string[] {
  if (value === undefined || value === "false" || value === "0") return false;
  if (value === "true" || value === "1") return true;
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
