import { z } from "zod";

/**
 * Body of POST /predict (form or JSON). Empty text is allowed: it still
 * yields a prediction.
 */
export const PredictRequestSchema = z.object({
  text: z.string({
    required_error: "text is required",
    invalid_type_error: "text must be a string",
  }),
});

export type PredictRequest = z.infer<typeof PredictRequestSchema>;
