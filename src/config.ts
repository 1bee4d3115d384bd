import { resolve } from 'node:path';
import { z } from 'zod';
import type { WikibaseClientOptions } from './server/wikibase.js';
import { ConfigError } from './sync/errors.js';

const envSchema = z.object({
  SCIENCESOURCE_API_URL: z.string().url(),
  SCIENCESOURCE_ACCESS_TOKEN: z.string().min(1),
  SCIENCESOURCE_LANGUAGE: z.string().min(1).default('en'),
});

function parseFlag(argv: string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  return idx !== -1 && idx + 1 < argv.length ? argv[idx + 1] : undefined;
}

export function parseStoragePath(argv: string[]): string {
  const raw = parseFlag(argv, '--storage') ?? './article.json';
  return resolve(process.cwd(), raw);
}

/** Default article text file for `sync_article`; no default without the flag */
export function parseContentPath(argv: string[]): string | undefined {
  const raw = parseFlag(argv, '--content');
  return raw === undefined ? undefined : resolve(process.cwd(), raw);
}

/** Connection settings for the remote store, taken from the environment */
export function loadStoreConfig(env: Record<string, string | undefined> = process.env): WikibaseClientOptions {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const names = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new ConfigError(`Missing or invalid store settings: ${names}`);
  }
  return {
    apiUrl: parsed.data.SCIENCESOURCE_API_URL,
    accessToken: parsed.data.SCIENCESOURCE_ACCESS_TOKEN,
    language: parsed.data.SCIENCESOURCE_LANGUAGE,
  };
}
