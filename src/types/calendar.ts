// src/types/calendar.ts

/**
 * Calendar event as the assistant sees it, normalized from the provider
 * Start and end are absolute instants; display goes through the session's
 * TimezoneNormalizer.
 */
export interface CalendarEvent {
  id: string;
  summary: string;
  description: string;
  location: string;
  start: Date;
  end: Date;
  allDay: boolean;
  attendees: string[];
  status: string;
  htmlLink: string;
}

/**
 * Cache row: a CalendarEvent plus bookkeeping timestamps (UTC storage format)
 */
export interface CachedEvent extends CalendarEvent {
  createdAt: string;
  updatedAt: string;
}

/**
 * Fields sent to the provider when inserting or replacing an event
 */
export interface EventWrite {
  summary: string;
  description: string;
  location: string;
  start: Date;
  end: Date;
  allDay: boolean;
  attendees: string[];
}

/**
 * Transient projection of an overlapping event, never persisted
 */
export interface Conflict {
  id: string;
  summary: string;
  start: Date;
  end: Date;
  location: string;
}

export const INTENTS = ['query', 'create', 'modify', 'cancel', 'quit'] as const;

export type Intent = (typeof INTENTS)[number];

export type ActionKind = 'create' | 'modify' | 'cancel';

/**
 * Extractor output for a new event. Times are zone-naive wall-clock strings
 * ("YYYY-MM-DD HH:MM") in the user's timezone.
 */
export interface CreatePayload {
  kind: 'create';
  summary: string;
  start: string;
  end: string;
  description: string;
  location: string;
  attendees: string[];
}

/**
 * Extractor output for a change to an existing event.
 * An absent key means "no change"; an empty string means "clear this field".
 */
export interface ModifyPayload {
  kind: 'modify';
  eventId: string;
  summary?: string;
  start?: string;
  end?: string;
  description?: string;
  location?: string;
  attendees?: string[];
}

export interface CancelPayload {
  kind: 'cancel';
  eventId: string;
}

export type ActionPayload = CreatePayload | ModifyPayload | CancelPayload;

/**
 * Extraction either yields a payload or a reason it could not understand the request
 */
export type ExtractionResult<T extends ActionPayload> =
  | { ok: true; payload: T }
  | { ok: false; reason: string };

/**
 * Uniform outcome of a provider mutation
 */
export interface MutationResult {
  success: boolean;
  eventId?: string;
  summary?: string;
  message: string;
  error?: string;
}

export interface ValidationOutcome {
  valid: boolean;
  message: string;
}

/**
 * Event shape returned over HTTP, times rendered in the user's timezone
 */
export interface EventView {
  id: string;
  summary: string;
  start: string;
  end: string;
  location: string;
  description: string;
}

/**
 * Result of one user turn through the assistant
 */
export interface AssistantTurn {
  intent: Intent;
  response: string;
  events: EventView[];
  query?: string;
}
