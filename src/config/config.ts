import dotenv from "dotenv";
import { z } from "zod";

import { TransportDefaults } from "../constants/OperationConstant";

// Blank entries in a .env file count as unset
const optionalText = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().optional(),
);

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  // Remittance service
  REMIT_HOST: z.string().url(),
  REMIT_ENVIRONMENT: z.enum(["sandbox", "production"]).default("sandbox"),
  REMIT_LOGIN_USER: optionalText,
  REMIT_LOGIN_PASS: optionalText,
  REMIT_ACCESS_KEY: optionalText,
  REMIT_AUTO_AUTH: flag.default("true"),

  // Transport
  REMIT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(TransportDefaults.TIMEOUT_MS),
  REMIT_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1)
    .default(TransportDefaults.MAX_ATTEMPTS),
  REMIT_BACKOFF_FACTOR: z.coerce
    .number()
    .min(0)
    .default(TransportDefaults.BACKOFF_FACTOR),

  // Logging
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
});

export type RemittanceConfig = z.infer<typeof envSchema>;

/**
 * Validate the environment. Reads .env into process.env when no explicit
 * source is given.
 */
export const loadConfig = (
  env?: Record<string, string | undefined>,
): RemittanceConfig => {
  if (!env) {
    dotenv.config();
  }

  const result = envSchema.safeParse(env ?? process.env);
  if (!result.success) {
    const invalid = result.error.issues
      .map((issue) => issue.path.join("."))
      .join(", ");

    throw new Error(`Missing or invalid environment variables: ${invalid}`);
  }

  return result.data;
};
