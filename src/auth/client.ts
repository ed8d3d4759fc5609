/**
 * OAuth client identity, loaded from the JSON a cloud console hands out.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors/types.js';

export interface OAuthClientIdentity {
  readonly id: string;
  readonly secret: string;
  readonly name?: string;
  readonly redirectUris: readonly string[];
}

const clientFieldsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  project_id: z.string().optional(),
  redirect_uris: z.array(z.string()).optional(),
});

/**
 * Console downloads wrap the fields in "installed" or "web".
 */
const clientJsonSchema = z.union([
  z.object({ installed: clientFieldsSchema }).transform((v) => v.installed),
  z.object({ web: clientFieldsSchema }).transform((v) => v.web),
  clientFieldsSchema,
]);

export function createOAuthClient(
  id: string,
  secret: string,
  options: { name?: string; redirectUris?: readonly string[] } = {}
): OAuthClientIdentity {
  if (!id || !secret) {
    throw new ConfigurationError('An OAuth client needs both an id and a secret');
  }
  return Object.freeze({
    id,
    secret,
    name: options.name,
    redirectUris: Object.freeze([...(options.redirectUris ?? [])]),
  });
}

/**
 * Build a client from a JSON file path or an already parsed object.
 */
export function oauthClientFromJson(source: string | object, name?: string): OAuthClientIdentity {
  let raw: unknown = source;
  if (typeof source === 'string') {
    try {
      raw = JSON.parse(readFileSync(source, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read OAuth client JSON from ${source}`,
        { operation: 'oauthClientFromJson', metadata: { path: source } },
        error instanceof Error ? error : undefined
      );
    }
  }

  const parsed = clientJsonSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'OAuth client JSON must contain client_id and client_secret, optionally under "installed" or "web"',
      { operation: 'oauthClientFromJson' }
    );
  }

  return createOAuthClient(parsed.data.client_id, parsed.data.client_secret, {
    name: name ?? parsed.data.project_id,
    redirectUris: parsed.data.redirect_uris,
  });
}
