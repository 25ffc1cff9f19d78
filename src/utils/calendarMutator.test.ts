// src/utils/calendarMutator.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import { CalendarMutator, inferEnd, mergeChanges } from './calendarMutator.js';
import type { CalendarProvider } from './calendarProvider.js';
import { TimezoneNormalizer } from '../lib/timezone.js';
import type { CalendarEvent } from '../types/calendar.js';

const logger = pino({ level: 'silent' });

const standup: CalendarEvent = {
  id: 'evt-1',
  summary: 'Planning',
  description: 'Quarterly',
  location: 'Room 4',
  start: new Date('2024-03-11T09:00:00Z'),
  end: new Date('2024-03-11T10:30:00Z'),
  allDay: false,
  attendees: ['ana@example.com'],
  status: 'confirmed',
  htmlLink: '',
};

const mockGet = vi.fn();
const mockInsert = vi.fn();
const mockUpdate = vi.fn();
const mockDelete = vi.fn();

const provider: CalendarProvider = {
  listUpcoming: vi.fn(),
  listRange: vi.fn(),
  getEvent: mockGet,
  insertEvent: mockInsert,
  updateEvent: mockUpdate,
  deleteEvent: mockDelete,
  getTimezone: vi.fn(),
};

describe('inferEnd', () => {
  it('should keep the original duration', () => {
    expect(inferEnd(standup, new Date('2024-03-12T09:00:00Z')).toISOString()).toBe(
      '2024-03-12T10:30:00.000Z'
    );
  });
});

const holiday: CalendarEvent = {
  ...standup,
  id: 'hol-1',
  summary: 'Offsite',
  start: new Date('2024-03-11T00:00:00Z'),
  end: new Date('2024-03-12T00:00:00Z'),
  allDay: true,
};

describe('mergeChanges', () => {
  it('should keep an all-day event all-day when no time changes', () => {
    const merged = mergeChanges(holiday, { summary: 'Team offsite' });

    expect(merged.allDay).toBe(true);
    expect(merged.start.toISOString()).toBe('2024-03-11T00:00:00.000Z');
  });

  it('should make an all-day event timed when its end changes', () => {
    const merged = mergeChanges(holiday, { end: new Date('2024-03-11T18:00:00Z') });

    expect(merged.allDay).toBe(false);
  });

  it('should infer the end when only the start changes', () => {
    const merged = mergeChanges(standup, { start: new Date('2024-03-12T09:00:00Z') });

    expect(merged.start.toISOString()).toBe('2024-03-12T09:00:00.000Z');
    expect(merged.end.toISOString()).toBe('2024-03-12T10:30:00.000Z');
    expect(merged.summary).toBe('Planning');
    expect(merged.location).toBe('Room 4');
  });

  it('should clear a field given an empty string', () => {
    const merged = mergeChanges(standup, { location: '' });

    expect(merged.location).toBe('');
    expect(merged.description).toBe('Quarterly');
  });

  it('should use an explicit end as given', () => {
    const merged = mergeChanges(standup, {
      start: new Date('2024-03-12T09:00:00Z'),
      end: new Date('2024-03-12T09:15:00Z'),
    });

    expect(merged.end.toISOString()).toBe('2024-03-12T09:15:00.000Z');
  });
});

describe('CalendarMutator', () => {
  let mutator: CalendarMutator;

  beforeEach(() => {
    vi.clearAllMocks();
    mutator = new CalendarMutator(provider, logger);
  });

  describe('create', () => {
    it('should report the created event', async () => {
      mockInsert.mockResolvedValue({ ...standup, id: 'new-1', summary: 'Lunch' });

      const result = await mutator.create({
        summary: 'Lunch',
        description: '',
        location: '',
        start: new Date('2024-03-11T17:00:00Z'),
        end: new Date('2024-03-11T18:00:00Z'),
        allDay: false,
        attendees: [],
      });

      expect(result).toEqual({
        success: true,
        eventId: 'new-1',
        summary: 'Lunch',
        message: "Event 'Lunch' created successfully",
      });
    });

    it('should turn provider errors into a failed result', async () => {
      mockInsert.mockRejectedValue(new Error('Invalid credentials'));

      const result = await mutator.create({
        summary: 'Lunch',
        description: '',
        location: '',
        start: new Date('2024-03-11T17:00:00Z'),
        end: new Date('2024-03-11T18:00:00Z'),
        allDay: false,
        attendees: [],
      });

      expect(result).toEqual({
        success: false,
        message: 'Failed to create event: Invalid credentials',
        error: 'Invalid credentials',
      });
    });
  });

  describe('modify', () => {
    it('should move the start and keep the duration', async () => {
      mockGet.mockResolvedValue(standup);
      mockUpdate.mockImplementation(async (_id: string, body: CalendarEvent) => ({
        ...standup,
        ...body,
      }));

      const result = await mutator.modify('evt-1', { start: new Date('2024-03-12T09:00:00Z') });

      expect(mockUpdate).toHaveBeenCalledWith('evt-1', {
        summary: 'Planning',
        description: 'Quarterly',
        location: 'Room 4',
        attendees: ['ana@example.com'],
        start: new Date('2024-03-12T09:00:00Z'),
        end: new Date('2024-03-12T10:30:00Z'),
        allDay: false,
      });
      expect(result.success).toBe(true);
      expect(result.message).toBe("Event 'Planning' updated successfully");
    });

    it('should write a moved all-day event at the requested local time', async () => {
      const tokyo = new TimezoneNormalizer('Asia/Tokyo', logger);
      mockGet.mockResolvedValue(holiday);
      mockUpdate.mockImplementation(async (id: string, input: object) => ({ ...holiday, ...input, id }));

      const result = await mutator.modify('hol-1', { start: tokyo.toUtc('2024-03-15 15:00') });

      expect(result.success).toBe(true);
      const [, written] = mockUpdate.mock.calls[0] ?? [];
      expect(written.allDay).toBe(false);
      expect(written.start.toISOString()).toBe('2024-03-15T06:00:00.000Z');
      expect(written.end.toISOString()).toBe('2024-03-16T06:00:00.000Z');
      expect(tokyo.toUserZone(written.start)).toBe('2024-03-15 15:00:00');
    });

    it('should keep the local date when an all-day event moves to midnight', async () => {
      const tokyo = new TimezoneNormalizer('Asia/Tokyo', logger);
      mockGet.mockResolvedValue(holiday);
      mockUpdate.mockImplementation(async (id: string, input: object) => ({ ...holiday, ...input, id }));

      await mutator.modify('hol-1', { start: tokyo.toUtc('2024-03-15 00:00') });

      const [, written] = mockUpdate.mock.calls[0] ?? [];
      expect(written.allDay).toBe(false);
      expect(tokyo.toUserZone(written.start)).toBe('2024-03-15 00:00:00');
    });

    it('should fail without updating when the event cannot be read', async () => {
      mockGet.mockRejectedValue(new Error('Not Found'));

      const result = await mutator.modify('missing', { summary: 'x' });

      expect(mockUpdate).not.toHaveBeenCalled();
      expect(result).toEqual({
        success: false,
        eventId: 'missing',
        message: 'Failed to modify event: Not Found',
        error: 'Not Found',
      });
    });
  });

  describe('cancel', () => {
    it('should delete and report the summary', async () => {
      mockGet.mockResolvedValue(standup);
      mockDelete.mockResolvedValue(undefined);

      const result = await mutator.cancel('evt-1');

      expect(mockDelete).toHaveBeenCalledWith('evt-1');
      expect(result).toEqual({
        success: true,
        eventId: 'evt-1',
        summary: 'Planning',
        message: "Event 'Planning' cancelled successfully",
      });
    });

    it('should report delete failures', async () => {
      mockGet.mockResolvedValue(standup);
      mockDelete.mockRejectedValue(new Error('Forbidden'));

      const result = await mutator.cancel('evt-1');

      expect(result.success).toBe(false);
      expect(result.message).toBe('Failed to cancel event: Forbidden');
    });
  });
});
