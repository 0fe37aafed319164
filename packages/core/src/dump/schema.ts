/**
 * Complex dump - Zod schemas
 *
 * A dump lists every cell and every incidence of a complex. Boundary order
 * is the order in which a parent's incidences appear. Identifiers are only
 * meaningful within one dump.
 */

import { z } from 'zod';

// ============================================================================
// Shared Primitives
// ============================================================================

export const DumpCellIdSchema = z.number().int().nonnegative();
export const DumpDimensionSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);
export const DumpOrientationSchema = z.union([z.literal(1), z.literal(-1)]);

export const DumpIncidenceSchema = z
  .object({
    parent: DumpCellIdSchema,
    child: DumpCellIdSchema,
    orientation: DumpOrientationSchema,
  })
  .strict();

export type DumpIncidence = z.infer<typeof DumpIncidenceSchema>;

// ============================================================================
// Dump
// ============================================================================

/**
 * Dump schema for a given payload schema
 */
export function complexDumpSchema<P>(payload: z.ZodType<P>) {
  return z
    .object({
      cells: z.array(
        z
          .object({
            id: DumpCellIdSchema,
            dimension: DumpDimensionSchema,
            payload: payload.optional(),
          })
          .strict()
      ),
      incidences: z.array(DumpIncidenceSchema),
    })
    .strict();
}

export interface DumpCell<P> {
  id: number;
  dimension: 0 | 1 | 2 | 3;
  payload?: P;
}

export interface ComplexDump<P = unknown> {
  cells: DumpCell<P>[];
  incidences: DumpIncidence[];
}

/**
 * Schema accepting any payload
 */
export const ComplexDumpSchema = complexDumpSchema(z.unknown());
