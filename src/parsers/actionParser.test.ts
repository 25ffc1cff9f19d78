// src/parsers/actionParser.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import { ActionParser } from './actionParser.js';
import { TimezoneNormalizer } from '../lib/timezone.js';
import type { CalendarEvent } from '../types/calendar.js';

const logger = pino({ level: 'silent' });
const mockComplete = vi.fn();

function known(id: string, summary: string, start: string): CalendarEvent {
  return {
    id,
    summary,
    description: '',
    location: '',
    start: new Date(start),
    end: new Date(new Date(start).getTime() + 60 * 60 * 1000),
    allDay: false,
    attendees: [],
    status: 'confirmed',
    htmlLink: '',
  };
}

const knownEvents = [
  known('abc123', 'Team standup', '2024-03-11T14:00:00Z'),
  known('def456', 'Dentist appointment', '2024-03-12T20:30:00Z'),
];

describe('ActionParser', () => {
  let parser: ActionParser;

  beforeEach(() => {
    vi.clearAllMocks();
    parser = new ActionParser(
      { complete: mockComplete },
      new TimezoneNormalizer('America/Bogota'),
      logger
    );
  });

  describe('extractCreate', () => {
    it('should extract a lunch tomorrow at noon', async () => {
      mockComplete.mockResolvedValue(
        JSON.stringify({
          summary: 'Lunch with Sam',
          start_time: '2024-03-11 12:00',
          end_time: '2024-03-11 13:00',
          description: '',
          location: '',
          attendees: [],
        })
      );

      const result = await parser.extractCreate('lunch with Sam tomorrow at noon', '2024-03-10');

      expect(result).toEqual({
        ok: true,
        payload: {
          kind: 'create',
          summary: 'Lunch with Sam',
          start: '2024-03-11 12:00',
          end: '2024-03-11 13:00',
          description: '',
          location: '',
          attendees: [],
        },
      });
    });

    it('should give the model the current date and the one-hour default', async () => {
      mockComplete.mockResolvedValue('{}');

      await parser.extractCreate('lunch tomorrow', '2024-03-10');

      const request = mockComplete.mock.calls[0]?.[0];
      expect(request.prompt).toContain('Current date: 2024-03-10');
      expect(request.prompt).toContain('default to 1 hour after start_time');
      expect(request.temperature).toBe(0.3);
    });

    it('should fill defaults for missing optional fields', async () => {
      mockComplete.mockResolvedValue(
        '```json\n{"start_time": "2024-03-11 09:00", "end_time": "2024-03-11 10:00", "location": null}\n```'
      );

      const result = await parser.extractCreate('something at 9', '2024-03-10');

      expect(result).toEqual({
        ok: true,
        payload: {
          kind: 'create',
          summary: 'Event',
          start: '2024-03-11 09:00',
          end: '2024-03-11 10:00',
          description: '',
          location: '',
          attendees: [],
        },
      });
    });

    it('should fail when the end time is missing', async () => {
      mockComplete.mockResolvedValue('{"summary": "Call", "start_time": "2024-03-11 09:00"}');

      const result = await parser.extractCreate('call at 9', '2024-03-10');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.reason).toContain('end_time');
      }
    });

    it('should fail on non-JSON output', async () => {
      mockComplete.mockResolvedValue('Sure! Here is your event.');

      const result = await parser.extractCreate('call at 9', '2024-03-10');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.reason).toMatch(/^Invalid JSON response: /);
      }
    });

    it('should fail on an empty response', async () => {
      mockComplete.mockResolvedValue('   ');

      expect(await parser.extractCreate('call at 9', '2024-03-10')).toEqual({
        ok: false,
        reason: 'Empty response from LLM',
      });
    });

    it('should fail without throwing when the call errors', async () => {
      mockComplete.mockRejectedValue(new Error('connection reset'));

      expect(await parser.extractCreate('call at 9', '2024-03-10')).toEqual({
        ok: false,
        reason: 'connection reset',
      });
    });
  });

  describe('extractModify', () => {
    it('should omit fields the model leaves null', async () => {
      mockComplete.mockResolvedValue(
        JSON.stringify({
          event_id: 'abc123',
          summary: null,
          start_time: '2024-03-12 09:00',
          end_time: null,
          description: null,
          location: '',
          attendees: null,
        })
      );

      const result = await parser.extractModify('move standup to 9 on tuesday', knownEvents);

      expect(result).toEqual({
        ok: true,
        payload: { kind: 'modify', eventId: 'abc123', start: '2024-03-12 09:00', location: '' },
      });
    });

    it('should treat an empty summary as no change', async () => {
      mockComplete.mockResolvedValue('{"event_id": "abc123", "summary": ""}');

      const result = await parser.extractModify('rename standup', knownEvents);

      expect(result).toEqual({ ok: true, payload: { kind: 'modify', eventId: 'abc123' } });
    });

    it('should list known events in the user zone', async () => {
      mockComplete.mockResolvedValue('{"event_id": "abc123"}');

      await parser.extractModify('move standup', knownEvents);

      const request = mockComplete.mock.calls[0]?.[0];
      expect(request.prompt).toContain('- abc123: Team standup on 2024-03-11 09:00 AM');
      expect(request.prompt).toContain('- def456: Dentist appointment on 2024-03-12 03:30 PM');
    });

    it('should fail when no event is identified', async () => {
      mockComplete.mockResolvedValue('{"event_id": null}');

      expect(await parser.extractModify('move it', knownEvents)).toEqual({
        ok: false,
        reason: 'Could not identify which event to modify',
      });
    });
  });

  describe('extractCancel', () => {
    it('should resolve a title reference to the known id', async () => {
      mockComplete.mockResolvedValue('{"event_id": "Dentist appointment"}');

      const result = await parser.extractCancel('cancel my dentist appointment', knownEvents);

      expect(result).toEqual({ ok: true, payload: { kind: 'cancel', eventId: 'def456' } });
    });

    it('should keep an unknown reference as is', async () => {
      mockComplete.mockResolvedValue('{"event_id": "zzz999"}');

      const result = await parser.extractCancel('cancel that thing', knownEvents);

      expect(result).toEqual({ ok: true, payload: { kind: 'cancel', eventId: 'zzz999' } });
    });

    it('should fail when no event is identified', async () => {
      mockComplete.mockResolvedValue('{}');

      expect(await parser.extractCancel('cancel', knownEvents)).toEqual({
        ok: false,
        reason: 'Could not identify which event to cancel',
      });
    });
  });

  describe('formatKnownEvents', () => {
    it('should say when there are no events', () => {
      expect(parser.formatKnownEvents([])).toBe('No events found.');
    });

    it('should cap the list at ten events', () => {
      const many = Array.from({ length: 12 }, (_, i) =>
        known(`id${i}`, `Event ${i}`, '2024-03-11T14:00:00Z')
      );

      expect(parser.formatKnownEvents(many).split('\n')).toHaveLength(10);
    });
  });
});
