import 'dotenv/config';
import { z } from 'zod';

/**
 * Comma-separated env value -> trimmed, non-empty list.
 */
const csvList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) =>
      val
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean)
    );

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .transform((val) => val === 'true' || val === '1')
    .pipe(z.boolean())
    .or(z.boolean())
    .default(fallback);

const configSchema = z.object({
  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Redis (optional, in-memory stores otherwise)
  redisUrl: z.string().url().optional(),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // OAuth2 validator settings
  oauthAllowedRedirectSchemes: csvList('http,https'),
  oauthPkceRequired: booleanFlag(true),
  oauthCodeChallengeMethods: csvList('plain,S256').pipe(z.array(z.enum(['plain', 'S256'])).min(1)),
  oauthScopes: csvList('read,write'),
  oauthDefaultScopes: csvList('read,write'),
  oauthAuthCodeLifetimeSecs: z.coerce.number().int().positive().default(60), // 1 minute
  oauthAccessTokenLifetimeSecs: z.coerce.number().int().positive().default(36000), // 10 hours
  oauthRefreshTokenLifetimeSecs: z.coerce.number().int().positive().default(1209600), // 14 days

  // CORS on the token endpoint
  oauthOriginPolicy: z.enum(['deny-all', 'registered']).default('deny-all'),

  // Transport
  oauthResourceOwnerHeader: z.string().min(1).default('x-authenticated-user'),
  oauthClientsFile: z.string().optional(),
})
  .superRefine((data, ctx) => {
    const unknownDefaults = data.oauthDefaultScopes.filter((s) => !data.oauthScopes.includes(s));
    if (unknownDefaults.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['oauthDefaultScopes'],
        message: `OAUTH_DEFAULT_SCOPES contains scopes missing from OAUTH_SCOPES: ${unknownDefaults.join(', ')}`,
      });
    }
    if (data.nodeEnv === 'production') {
      if (!data.redisUrl) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['redisUrl'],
          message: 'REDIS_URL is required in production (in-memory storage is not suitable)',
        });
      }
      if (data.oauthAllowedRedirectSchemes.includes('http')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['oauthAllowedRedirectSchemes'],
          message: 'OAUTH_ALLOWED_REDIRECT_SCHEMES must not allow plaintext http in production',
        });
      }
    }
  });

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    port: env['PORT'],
    nodeEnv: env['NODE_ENV'],
    redisUrl: env['REDIS_URL'],
    logLevel: env['LOG_LEVEL'],
    oauthAllowedRedirectSchemes: env['OAUTH_ALLOWED_REDIRECT_SCHEMES'],
    oauthPkceRequired: env['OAUTH_PKCE_REQUIRED'],
    oauthCodeChallengeMethods: env['OAUTH_CODE_CHALLENGE_METHODS'],
    oauthScopes: env['OAUTH_SCOPES'],
    oauthDefaultScopes: env['OAUTH_DEFAULT_SCOPES'],
    oauthAuthCodeLifetimeSecs: env['OAUTH_AUTH_CODE_LIFETIME_SECS'],
    oauthAccessTokenLifetimeSecs: env['OAUTH_ACCESS_TOKEN_LIFETIME_SECS'],
    oauthRefreshTokenLifetimeSecs: env['OAUTH_REFRESH_TOKEN_LIFETIME_SECS'],
    oauthOriginPolicy: env['OAUTH_ORIGIN_POLICY'],
    oauthResourceOwnerHeader: env['OAUTH_RESOURCE_OWNER_HEADER'],
    oauthClientsFile: env['OAUTH_CLIENTS_FILE'],
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

export const config = loadConfig();
