import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  GEMINI_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  GEMINI_MODEL: z.preprocess(
    blankToUndefined,
    z.string().trim().default("gemini-2.5-flash")
  ),
});

export type AppConfig = {
  geminiApiKey?: string;
  geminiModel: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    geminiApiKey: parsed.GEMINI_API_KEY,
    geminiModel: parsed.GEMINI_MODEL,
  };
}
