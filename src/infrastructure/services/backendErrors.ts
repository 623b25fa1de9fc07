import { z } from "zod";
import { BackendErrorPayload } from "../../domain/errors/ShipperErrors";

const structuredError = z.object({
  error: z.object({
    code: z.number(),
    message: z.string(),
    status: z.string(),
  }),
});

// OAuth endpoints answer with `{ error: "invalid_grant", error_description }`.
const oauthError = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Recognizes an error object embedded in a response body and normalizes
 * it to `{ code, message, status }`.
 */
export const backendErrorSchema = z
  .union([structuredError, oauthError])
  .transform((value): BackendErrorPayload => {
    const error = value.error;
    if (typeof error === "string") {
      const description = "error_description" in value ? value.error_description : undefined;
      return { code: 0, message: description ?? error, status: error };
    }
    return error;
  });
