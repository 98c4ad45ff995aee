/**
 * Idea batch — a ranked idea list stamped with an id and generation time,
 * the unit written to and read back from export files.
 */

import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { IdeaSchema } from '../ideas/schemas.js'
import type { Idea } from '../ideas/schemas.js'

export const IdeaBatchSchema = z.object({
  id: z.string().uuid(),
  theme: z.string(),
  constraints: z.array(z.string()),
  generatedAt: z.string().datetime(),
  ideas: z.array(IdeaSchema),
})

export type IdeaBatch = z.infer<typeof IdeaBatchSchema>

export function createIdeaBatch(
  theme: string,
  constraints: readonly string[],
  ideas: readonly Idea[],
  now: Date = new Date(),
): IdeaBatch {
  return {
    id: uuidv4(),
    theme,
    constraints: [...constraints],
    generatedAt: now.toISOString(),
    ideas: [...ideas],
  }
}
