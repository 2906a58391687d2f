import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { CategoryTarget, Config } from './types.js';

export const DEFAULT_AFFILIATE_TAG = 'dealwatch-21';

export const MEGA_DISCOUNT_BAND = { min: 80, max: 95 } as const;

const DEFAULT_CATEGORIES: Record<string, string> = {
  mobiles: 'https://www.amazon.in/s?k=smartphones',
  accessories: 'https://www.amazon.in/s?k=mobile+accessories',
  home: 'https://www.amazon.in/s?k=home+and+kitchen',
  watches: 'https://www.amazon.in/s?k=watches',
};

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/117.0 Safari/537.36';

const PLACEHOLDER_PATTERN = /^(changeme|change-me|todo|x+|0+|your[-_ ].*|<.*>)$/i;

const credential = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`)
    .refine((value) => !PLACEHOLDER_PATTERN.test(value), `${name} looks like a placeholder value`);

const amount = (fallback: string) =>
  z.string().transform(Number).pipe(z.number().finite().nonnegative()).default(fallback);

const positiveInt = (fallback: string) =>
  z.string().transform(Number).pipe(z.number().int().positive()).default(fallback);

const categoriesSchema = z
  .string()
  .default(JSON.stringify(DEFAULT_CATEGORIES))
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'CATEGORIES must be a JSON object of name to URL' });
      return z.NEVER;
    }
  })
  .pipe(
    z
      .record(z.string().min(1), z.string().url())
      .refine((categories) => Object.keys(categories).length > 0, 'No categories defined'),
  );

const envSchema = z
  .object({
    DISCORD_TOKEN: credential('DISCORD_TOKEN'),
    ALERT_CHANNEL_ID: credential('ALERT_CHANNEL_ID'),
    AFFILIATE_TAG: z.string().trim().min(1).default(DEFAULT_AFFILIATE_TAG),
    MIN_PRICE: amount('150'),
    MAX_PRICE: amount('1000'),
    CHECK_INTERVAL_MIN: positiveInt('3'),
    MAX_ITEMS_PER_CATEGORY: positiveInt('12'),
    CATEGORIES: categoriesSchema,
    BASE_DOMAIN: z.string().url().default('https://www.amazon.in'),
    USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
    ACCEPT_LANGUAGE: z.string().min(1).default('en-IN,en;q=0.9'),
    REQUEST_TIMEOUT_MS: positiveInt('25000'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.MIN_PRICE > env.MAX_PRICE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIN_PRICE'],
        message: `MIN_PRICE (${env.MIN_PRICE}) must not exceed MAX_PRICE (${env.MAX_PRICE})`,
      });
    }
  });

/**
 * Reads and validates the environment once at startup. Every problem found is
 * collected into a single {@link ConfigError}.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const key = issue.path.join('.');
      return key && !issue.message.startsWith(key) ? `${key}: ${issue.message}` : issue.message;
    });
    throw new ConfigError(issues);
  }

  const env = result.data;
  const categories: CategoryTarget[] = Object.entries(env.CATEGORIES).map(([name, sourceUrl]) =>
    Object.freeze({ name, sourceUrl }),
  );

  return Object.freeze({
    discord: Object.freeze({
      token: env.DISCORD_TOKEN,
      alertChannelId: env.ALERT_CHANNEL_ID,
    }),
    source: Object.freeze({
      baseUrl: env.BASE_DOMAIN.replace(/\/+$/, ''),
      userAgent: env.USER_AGENT,
      acceptLanguage: env.ACCEPT_LANGUAGE,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    }),
    categories: Object.freeze(categories),
    run: Object.freeze({
      priceBand: Object.freeze({ min: env.MIN_PRICE, max: env.MAX_PRICE }),
      megaDiscountBand: Object.freeze({ ...MEGA_DISCOUNT_BAND }),
      maxItemsPerCategory: env.MAX_ITEMS_PER_CATEGORY,
      pollIntervalMinutes: env.CHECK_INTERVAL_MIN,
      affiliateTag: env.AFFILIATE_TAG,
    }),
    logLevel: env.LOG_LEVEL,
  });
}

export function configWarnings(config: Config): string[] {
  const warnings: string[] = [];
  if (config.run.affiliateTag === DEFAULT_AFFILIATE_TAG) {
    warnings.push('Using default affiliate tag. Set AFFILIATE_TAG to your own tag.');
  }
  return warnings;
}
