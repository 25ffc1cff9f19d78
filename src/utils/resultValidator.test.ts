// src/utils/resultValidator.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import { ResultValidator } from './resultValidator.js';
import { TimezoneNormalizer } from '../lib/timezone.js';
import type { CalendarEvent } from '../types/calendar.js';

const logger = pino({ level: 'silent' });
const mockComplete = vi.fn();

const lunch: CalendarEvent = {
  id: 'new-1',
  summary: 'Lunch',
  description: '',
  location: '',
  start: new Date('2024-03-11T17:00:00Z'),
  end: new Date('2024-03-11T18:00:00Z'),
  allDay: false,
  attendees: [],
  status: 'confirmed',
  htmlLink: '',
};

describe('ResultValidator', () => {
  let validator: ResultValidator;

  beforeEach(() => {
    vi.clearAllMocks();
    validator = new ResultValidator(
      { complete: mockComplete },
      new TimezoneNormalizer('America/Bogota'),
      logger
    );
  });

  it('should describe the cached event in the user zone', async () => {
    mockComplete.mockResolvedValue('{"valid": true, "message": "Matches"}');

    const outcome = await validator.validate('lunch tomorrow at noon', 'create', lunch);

    expect(outcome).toEqual({ valid: true, message: 'Matches' });
    const request = mockComplete.mock.calls[0]?.[0];
    expect(request.prompt).toContain(
      'Result in database: Summary: Lunch, Start: 2024-03-11 12:00 PM, End: 2024-03-11 01:00 PM'
    );
    expect(request.temperature).toBe(0.1);
    expect(request.maxTokens).toBe(100);
  });

  it('should describe a missing event for cancellations', async () => {
    mockComplete.mockResolvedValue('{"valid": true, "message": "Deleted"}');

    await validator.validate('cancel lunch', 'cancel', null);

    const request = mockComplete.mock.calls[0]?.[0];
    expect(request.prompt).toContain('Result in database: Event not found or was deleted');
  });

  it('should pass through a mismatch verdict', async () => {
    mockComplete.mockResolvedValue('```json\n{"valid": false, "message": "Wrong day"}\n```');

    expect(await validator.validate('lunch friday', 'create', lunch)).toEqual({
      valid: false,
      message: 'Wrong day',
    });
  });

  it('should fail open when the call errors', async () => {
    mockComplete.mockRejectedValue(new Error('timeout'));

    expect(await validator.validate('lunch', 'create', lunch)).toEqual({
      valid: true,
      message: 'Validation error: timeout',
    });
  });

  it('should fail open on unreadable output', async () => {
    mockComplete.mockResolvedValue('looks fine to me');

    const outcome = await validator.validate('lunch', 'create', lunch);

    expect(outcome.valid).toBe(true);
    expect(outcome.message).toMatch(/^Validation error: /);
  });
});
