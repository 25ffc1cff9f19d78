// src/parsers/queryTranslator.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import { QueryTranslator, buildQueryPrompt, shiftDate } from './queryTranslator.js';

const logger = pino({ level: 'silent' });
const mockComplete = vi.fn();

describe('shiftDate', () => {
  it('should roll over month and year boundaries', () => {
    expect(shiftDate('2024-02-28', 1)).toBe('2024-02-29');
    expect(shiftDate('2024-12-31', 1)).toBe('2025-01-01');
    expect(shiftDate('2024-03-10', 7)).toBe('2024-03-17');
  });
});

describe('buildQueryPrompt', () => {
  it('should bucket examples with the modifier against literal dates', () => {
    const prompt = buildQueryPrompt('events tomorrow', 'Table: events', '-5 hours', '2024-03-10');

    expect(prompt).toContain(
      `"events tomorrow" -> SELECT * FROM events WHERE date(datetime(start_time, '-5 hours')) = '2024-03-11' ORDER BY start_time`
    );
    expect(prompt).toContain('Current date in user timezone: 2024-03-10');
    expect(prompt).toContain('Schema:\nTable: events');
  });
});

describe('QueryTranslator', () => {
  let translator: QueryTranslator;

  beforeEach(() => {
    vi.clearAllMocks();
    translator = new QueryTranslator({ complete: mockComplete }, logger);
  });

  it('should strip sql fences', async () => {
    mockComplete.mockResolvedValue('```sql\nSELECT * FROM events ORDER BY start_time\n```');

    expect(await translator.toQuery('show all', 'Table: events', '+0 hours', '2024-03-10')).toBe(
      'SELECT * FROM events ORDER BY start_time'
    );
  });

  it('should return null for empty output', async () => {
    mockComplete.mockResolvedValue('');

    expect(await translator.toQuery('show all', 'Table: events', '+0 hours', '2024-03-10')).toBeNull();
  });

  it('should return null when the call fails', async () => {
    mockComplete.mockRejectedValue(new Error('boom'));

    expect(await translator.toQuery('show all', 'Table: events', '+0 hours', '2024-03-10')).toBeNull();
  });
});
