import { z } from 'zod';
import { TILE_SIZE } from '../config';
import { Grid } from './Grid';

const CellRowSchema = z.array(z.number().int().nonnegative()).min(1);

export const LevelSchema = z.object({
  name: z.string().min(1),
  cells: z
    .array(CellRowSchema)
    .min(1)
    .refine((rows) => rows.every((row) => row.length === rows[0].length), {
      message: 'All rows must have the same length',
    }),
});

export type LevelData = z.infer<typeof LevelSchema>;

export interface Level {
  name: string;
  grid: Grid;
}

/**
 * Validates raw level JSON (as loaded from `public/maps`) and builds its grid.
 * Throws a ZodError when the data does not match the schema.
 */
export function parseLevel(raw: unknown, tileSize: number = TILE_SIZE): Level {
  const data = LevelSchema.parse(raw);
  return { name: data.name, grid: new Grid(data.cells, tileSize) };
}
