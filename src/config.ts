/**
 * Schemas for everything that crosses a trust boundary: caller-declared
 * client metadata, registration and token responses, discovery documents and
 * environment settings.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const isHttpUri = (value: string): boolean => {
  try {
    const url = new URL(value);
    return (
      (url.protocol === 'http:' || url.protocol === 'https:') &&
      url.hostname.length > 0
    );
  } catch {
    return false;
  }
};

const RedirectUriSchema = z
  .string()
  .refine(
    isHttpUri,
    'Redirect URI must be an absolute http(s) URI with a host'
  );

const OptionalUrl = z.string().url('Invalid URL').optional();

/**
 * Registration intent declared by the application.
 */
export const ClientMetadataSchema = z.object({
  client_name: z.string().min(1, 'client_name is required'),
  redirect_uris: z
    .array(RedirectUriSchema)
    .min(1, 'At least one redirect URI is required'),
  grant_types: z
    .array(z.enum(['authorization_code', 'refresh_token']))
    .min(1, 'At least one grant type is required')
    .default(['authorization_code', 'refresh_token']),
  response_types: z
    .array(z.string())
    .refine((types) => types.includes('code'), {
      message: 'response_types must include "code"',
    })
    .default(['code']),
  token_endpoint_auth_method: z
    .enum(['none', 'client_secret_post', 'client_secret_basic'])
    .default('none'),
  scope: z.string().optional(),
  client_uri: OptionalUrl,
  logo_uri: OptionalUrl,
  tos_uri: OptionalUrl,
  policy_uri: OptionalUrl,
  contacts: z.array(z.string()).optional(),
});

export type ClientMetadataInput = z.input<typeof ClientMetadataSchema>;
export type ClientMetadata = z.output<typeof ClientMetadataSchema>;
export type TokenEndpointAuthMethod = ClientMetadata['token_endpoint_auth_method'];

/**
 * Registration response, or credentials supplied up front.
 */
export const ClientCredentialsSchema = z.object({
  client_id: z.string().min(1, 'client_id is required'),
  client_secret: z.string().min(1).optional(),
  redirect_uris: z.array(z.string()).optional(),
  client_id_issued_at: z.number().optional(),
  client_secret_expires_at: z.number().optional(),
});

export type ClientCredentials = z.infer<typeof ClientCredentialsSchema>;

/**
 * Authorization server metadata (RFC 8414 / OpenID discovery subset).
 */
export const ServerMetadataSchema = z.object({
  issuer: z.string().url('Invalid issuer URL'),
  authorization_endpoint: z.string().url('Invalid authorization endpoint URL'),
  token_endpoint: z.string().url('Invalid token endpoint URL'),
  registration_endpoint: z
    .string()
    .url('Invalid registration endpoint URL')
    .optional(),
  scopes_supported: z.array(z.string()).optional(),
  grant_types_supported: z.array(z.string()).optional(),
  response_types_supported: z.array(z.string()).optional(),
  code_challenge_methods_supported: z.array(z.string()).optional(),
  token_endpoint_auth_methods_supported: z.array(z.string()).optional(),
});

export type ServerMetadata = z.infer<typeof ServerMetadataSchema>;

/**
 * Successful token endpoint response. `expires_in` arrives as a string from
 * some servers.
 */
export const RawTokenResponseSchema = z.object({
  access_token: z.string().min(1, 'Missing access_token in token response'),
  token_type: z.string().optional(),
  refresh_token: z.string().optional(),
  expires_in: z.coerce.number().nonnegative().optional(),
  scope: z.string().optional(),
});

export type RawTokenResponse = z.infer<typeof RawTokenResponseSchema>;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

/**
 * Settings read from an explicitly passed environment record.
 */
export const EnvironmentSettingsSchema = z.object({
  OAUTH_CALLBACK_PORT: z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .int('OAUTH_CALLBACK_PORT must be an integer')
      .min(1)
      .max(65535)
      .optional()
  ),
  OAUTH_TIMEOUT_SECONDS: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive('OAUTH_TIMEOUT_SECONDS must be positive').optional()
  ),
  OAUTH_CLIENT_ID: z.preprocess(blankToUndefined, z.string().optional()),
  OAUTH_CLIENT_SECRET: z.preprocess(blankToUndefined, z.string().optional()),
  OAUTH_SCOPE: z.preprocess(blankToUndefined, z.string().optional()),
  OAUTH_LOG_LEVEL: z.preprocess(blankToUndefined, z.string().optional()),
});

export type EnvironmentSettings = z.infer<typeof EnvironmentSettingsSchema>;

/**
 * Render zod issues as `path: message` pairs.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}

/**
 * Parse `value` with `schema`.
 * @param what - Name of the validated thing, used in the error message
 * @throws ConfigurationError carrying the ZodError as its cause
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid ${what}: ${formatIssues(result.error)}`,
      { stage: 'validate', cause: result.error }
    );
  }
  return result.data;
}

/**
 * Validate client metadata and freeze the result.
 */
export function validateClientMetadata(input: unknown): Readonly<ClientMetadata> {
  const metadata = validate(ClientMetadataSchema, input, 'client metadata');
  Object.freeze(metadata.redirect_uris);
  Object.freeze(metadata.grant_types);
  Object.freeze(metadata.response_types);
  return Object.freeze(metadata);
}
