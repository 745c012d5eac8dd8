import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type {
  BusinessSettings,
  DiscountTier,
  PriceCatalog,
} from '../shared/types/index.js';
import { ConfigurationError } from '../shared/utils/errors.js';
import { logger } from '../shared/utils/logger.js';

export const BusinessSettingsSchema = z.object({
  tax_rate: z.number().min(0).default(0.095),
  default_currency: z.string().length(3).toUpperCase().default('USD'),
  quote_validity_days: z.number().int().min(0).default(7),
  sla_hours: z.number().int().positive().default(24),
  company_name: z.string().min(1).default('Acme Corp'),
  contact_email: z.string().email().default('sales@acme.com'),
});

export const PriceCatalogSchema = z.record(
  z.object({
    price: z.number().nonnegative(),
    unit: z.string().min(1).default('piece'),
  })
);

// A null or missing upper bound leaves the last tier open-ended
export const DiscountRulesSchema = z.object({
  tiers: z.array(
    z.object({
      min_amount: z.number().min(0).default(0),
      max_amount: z
        .number()
        .nullable()
        .optional()
        .transform((value) => value ?? Number.POSITIVE_INFINITY),
      discount: z.number().min(0).max(1).default(0),
    })
  ),
});

export interface BusinessConfig {
  settings: BusinessSettings;
  catalog: PriceCatalog;
  tiers: DiscountTier[];
}

export const DEFAULT_PRICE_CATALOG: PriceCatalog = {
  'Widget Pro': { price: 25.0, unit: 'piece' },
  'Gadget Basic': { price: 15.5, unit: 'piece' },
  'Tool Kit': { price: 45.0, unit: 'kit' },
  'Premium Widget': { price: 75.0, unit: 'piece' },
  'Bulk Pack': { price: 200.0, unit: 'pack' },
};

export const DEFAULT_DISCOUNT_TIERS: DiscountTier[] = [
  { min_amount: 0, max_amount: 100, discount: 0.05 },
  { min_amount: 100, max_amount: 500, discount: 0.1 },
  { min_amount: 500, max_amount: 1000, discount: 0.15 },
  { min_amount: 1000, max_amount: Number.POSITIVE_INFINITY, discount: 0.2 },
];

export const DEFAULT_BUSINESS_SETTINGS: BusinessSettings = BusinessSettingsSchema.parse({});

/**
 * Read and validate one JSON file from the configuration directory.
 * Returns undefined when the file does not exist.
 */
function readConfigFile<T extends z.ZodTypeAny>(
  configDir: string,
  filename: string,
  schema: T
): z.infer<T> | undefined {
  const filePath = join(configDir, filename);
  if (!existsSync(filePath)) {
    logger.debug({ filePath }, 'Configuration file not found, using defaults');
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      filename,
      error instanceof Error ? error.message : String(error)
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    throw new ConfigurationError(filename, details);
  }

  return result.data;
}

/**
 * Load settings, price list and discount tiers from a configuration directory
 */
export function loadBusinessConfig(configDir: string): BusinessConfig {
  const settings =
    readConfigFile(configDir, 'defaults.json', BusinessSettingsSchema) ??
    DEFAULT_BUSINESS_SETTINGS;
  const catalog =
    readConfigFile(configDir, 'price_list.json', PriceCatalogSchema) ?? DEFAULT_PRICE_CATALOG;
  const rules = readConfigFile(configDir, 'discount_rules.json', DiscountRulesSchema);

  const businessConfig: BusinessConfig = {
    settings,
    catalog,
    tiers: rules?.tiers ?? DEFAULT_DISCOUNT_TIERS,
  };

  logger.info(
    {
      configDir,
      products: Object.keys(businessConfig.catalog).length,
      tiers: businessConfig.tiers.length,
    },
    'Business configuration loaded'
  );

  return businessConfig;
}
