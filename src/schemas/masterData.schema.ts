import { z } from 'zod';
import { QUANTITY_MAX } from '../lib/numbers';

export const itemSchema = z.object({
  code: z.string().trim().min(1).max(100),
  name: z.string().trim().min(1).max(255),
  unit: z.string().trim().min(1).max(32).default('pcs'),
  category: z.string().max(255).nullable().optional(),
  description: z.string().max(2000).nullable().optional(),
  minStock: z.number().finite().max(QUANTITY_MAX).min(0).default(0),
  unitPrice: z.number().finite().max(QUANTITY_MAX).min(0).nullable().optional(),
  active: z.boolean().optional()
});

export const itemUpdateSchema = z
  .object({
    code: z.string().trim().min(1).max(100),
    name: z.string().trim().min(1).max(255),
    unit: z.string().trim().min(1).max(32),
    category: z.string().max(255).nullable(),
    description: z.string().max(2000).nullable(),
    minStock: z.number().finite().max(QUANTITY_MAX).min(0),
    unitPrice: z.number().finite().max(QUANTITY_MAX).min(0).nullable(),
    active: z.boolean()
  })
  .partial()
  .refine((value) => Object.keys(value).length > 0, { message: 'At least one field is required.' });

export const itemListQuerySchema = z.object({
  active_only: z.enum(['true', 'false']).optional(),
  search: z.string().trim().min(1).max(255).optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
  offset: z.coerce.number().int().nonnegative().optional()
});

export const locationSchema = z.object({
  code: z.string().trim().min(1).max(100),
  description: z.string().max(2000).nullable().optional(),
  active: z.boolean().optional()
});

export const locationUpdateSchema = z
  .object({
    code: z.string().trim().min(1).max(100),
    description: z.string().max(2000).nullable(),
    active: z.boolean()
  })
  .partial()
  .refine((value) => Object.keys(value).length > 0, { message: 'At least one field is required.' });

export const locationListQuerySchema = z.object({
  active_only: z.enum(['true', 'false']).optional()
});
