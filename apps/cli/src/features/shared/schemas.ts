import { isValidBech32Prefix } from '@addrbridge/address-converter';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const AddressArgumentSchema = z.string().trim().min(1, { message: 'Address must not be empty' });

export const ConvertCommandOptionsSchema = JsonFlagSchema;

export const ToPrefixCommandOptionsSchema = JsonFlagSchema.extend({
  prefix: z.string({ required_error: 'Missing required option --prefix' }).trim().min(1, {
    message: 'Missing required option --prefix',
  }),
});

/**
 * --prefixes takes a comma-separated list; each entry must be encodable.
 */
export const VariantsCommandOptionsSchema = JsonFlagSchema.extend({
  prefixes: z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? undefined
        : value
            .split(',')
            .map((prefix) => prefix.trim())
            .filter((prefix) => prefix.length > 0)
    )
    .refine((prefixes) => prefixes === undefined || prefixes.every(isValidBech32Prefix), {
      message: 'Prefixes must be lowercase letters, separated by commas',
    }),
});

export const BatchCommandOptionsSchema = JsonFlagSchema.extend({
  file: z.string().trim().min(1).optional(),
});

export const ListChainsCommandOptionsSchema = JsonFlagSchema;
