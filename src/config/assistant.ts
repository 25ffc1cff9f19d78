// src/config/assistant.ts

/**
 * Tuning constants for the assistant pipeline
 */

// Sampling parameters for general prompts (extraction, SQL, replies)
export const LLM_TEMPERATURE = 0.3;
export const LLM_MAX_TOKENS = 300;

// Intent classification returns a single word
export const INTENT_TEMPERATURE = 0.1;
export const INTENT_MAX_TOKENS = 10;

// Validation returns a short JSON verdict
export const VALIDATION_TEMPERATURE = 0.1;
export const VALIDATION_MAX_TOKENS = 100;

// How many events go into each prompt
export const MAX_EVENTS_FOR_PARSER = 10;
export const MAX_EVENTS_FOR_RESPONSE = 20;
export const MAX_EVENTS_FOR_QA = 20;

// Summary similarity needed to resolve an event reference by title
export const EVENT_MATCH_THRESHOLD = 0.7;

// Display format for event times in prompts and messages
export const DISPLAY_FORMAT = 'yyyy-MM-dd hh:mm a';

// Wall-clock format the extractor asks the model for
export const WALL_CLOCK_PATTERN = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2})?$/;

// Interval between expired-session sweeps
export const SESSION_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Timezones offered by the terminal chat's `list` command
 */
export const COMMON_TIMEZONES: Array<[string, string]> = [
  ['UTC', 'UTC'],
  ['America/New_York', 'Eastern Time (US)'],
  ['America/Chicago', 'Central Time (US)'],
  ['America/Denver', 'Mountain Time (US)'],
  ['America/Los_Angeles', 'Pacific Time (US)'],
  ['Europe/London', 'London'],
  ['Europe/Paris', 'Paris'],
  ['Asia/Kolkata', 'India'],
  ['Asia/Tokyo', 'Tokyo'],
  ['Australia/Sydney', 'Sydney'],
];
