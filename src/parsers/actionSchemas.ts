// src/parsers/actionSchemas.ts
import { z } from 'zod';
import { WALL_CLOCK_PATTERN } from '../config/assistant.js';

/**
 * Schemas for the JSON the extractor asks the model for.
 * Keys are snake_case because that's what the prompts request.
 */

const wallClock = z
  .string()
  .trim()
  .regex(WALL_CLOCK_PATTERN, 'Expected time in format "YYYY-MM-DD HH:MM"');

// Models sometimes return ids as numbers
const eventId = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

export const createActionSchema = z.object({
  summary: z.string().nullish(),
  start_time: wallClock,
  end_time: wallClock,
  description: z.string().nullish(),
  location: z.string().nullish(),
  attendees: z.array(z.string()).nullish(),
});

export const modifyActionSchema = z.object({
  event_id: eventId.nullish(),
  summary: z.string().nullish(),
  start_time: wallClock.nullish(),
  end_time: wallClock.nullish(),
  description: z.string().nullish(),
  location: z.string().nullish(),
  attendees: z.array(z.string()).nullish(),
});

export const cancelActionSchema = z.object({
  event_id: eventId.nullish(),
});

export type CreateActionJson = z.infer<typeof createActionSchema>;
export type ModifyActionJson = z.infer<typeof modifyActionSchema>;
export type CancelActionJson = z.infer<typeof cancelActionSchema>;
