import { z } from "zod";

export const DEFAULT_INFERENCE_TIMEOUT_MS = 90_000;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const appConfigSchema = z.object({
  port: z.coerce.number().int().nonnegative(),
  inference: z.object({
    apiKey: optionalString,
    baseUrl: optionalString,
    model: z.string().min(1),
    timeoutMs: z.coerce.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return appConfigSchema.parse({
    port: env.PORT ?? "8080",
    inference: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.INFERENCE_MODEL ?? "chatgpt-4o-latest",
      timeoutMs: env.INFERENCE_TIMEOUT_MS ?? String(DEFAULT_INFERENCE_TIMEOUT_MS),
    },
  });
}
