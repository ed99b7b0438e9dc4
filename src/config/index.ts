import dotenv from 'dotenv';
import type { ZodIssue } from 'zod';
import { configSchema, type Config } from './schema.js';

dotenv.config();

export const parseConfig = (env: NodeJS.ProcessEnv): Config => {
  const parsed = configSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.errors
      .map((issue: ZodIssue) => {
        const label = issue.path.length ? issue.path.join('.') : 'env';
        return `- ${label}: ${issue.message}`;
      })
      .join('\n');

    throw new Error(`Configuration validation failed:\n${details}`);
  }

  return parsed.data;
};

export const config = parseConfig(process.env);
