/**
 * Zod schemas for extraction options and serialized action spaces.
 */
import { z } from 'zod';
import { DEFAULT_VIEWPORT_EXPANSION, PATH_SCHEME, UNBOUNDED_VIEWPORT } from './constants.js';
import { decodeActionId, isValidActionId, roleForPrefix } from './action-id.js';

export const extractionOptionsSchema = z.object({
  highlight: z.boolean().default(false),
  focusHighlightIndex: z.number().int().min(0).optional(),
  viewportExpansion: z.number().int().min(UNBOUNDED_VIEWPORT).default(DEFAULT_VIEWPORT_EXPANSION),
  highlightFromIndex: z.number().int().min(0).default(0),
  verbose: z.boolean().default(false),
});

export const actionParameterSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['str', 'number', 'date', 'boolean']),
  default: z.string().optional(),
  allowedValues: z.array(z.string()).optional(),
});

export const actionSchema = z.object({
  id: z.string().refine(isValidActionId, { message: 'Action ID must look like B1, L2 or I3' }),
  role: z.enum(['button', 'link', 'input']),
  description: z.string().min(1),
  category: z.string().min(1),
  parameters: z.array(actionParameterSchema).optional(),
  tag: z.string().min(1),
  path: z.string().min(1),
  fingerprint: z.string(),
});

export const actionSpaceDataSchema = z
  .object({
    pathScheme: z.literal(PATH_SCHEME),
    url: z.string(),
    title: z.string(),
    actions: z.array(actionSchema),
    counters: z
      .object({
        B: z.number().int().min(0),
        L: z.number().int().min(0),
        I: z.number().int().min(0),
      })
      .optional(),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.actions.forEach((action, i) => {
      if (seen.has(action.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate action ID ${action.id}`,
          path: ['actions', i, 'id'],
        });
      }
      seen.add(action.id);
      const decoded = decodeActionId(action.id);
      if (decoded && roleForPrefix(decoded.prefix) !== action.role) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Action ${action.id} has role ${action.role}`,
          path: ['actions', i, 'role'],
        });
      }
    });
  });
