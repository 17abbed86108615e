import { Test, TestingModule } from '@nestjs/testing';
import { ENGINE_CONFIG, loadEngineConfig } from '../../config/engine.config';
import { CLOCK } from '../booking.constants';
import { Occurrence, RecurrenceFrequency } from '../domain/booking.types';
import { TimeRange } from '../domain/time-range';
import { bookingFixture, fixedClock, utcRange } from '../testing/booking.fixtures';
import { ConflictDetectionService } from './conflict-detection.service';
import { RecurrenceService } from './recurrence.service';
import { SlotSuggestionService } from './slot-suggestion.service';

const starts = (ranges: TimeRange[]) => ranges.map((r) => r.start.toISOString());

describe('Next Available Slots Suggestions', () => {
  async function createModule(env: Record<string, string> = {}) {
    return Test.createTestingModule({
      providers: [
        SlotSuggestionService,
        RecurrenceService,
        ConflictDetectionService,
        {
          provide: ENGINE_CONFIG,
          useValue: loadEngineConfig({ STORAGE_DRIVER: 'memory', ...env }),
        },
        { provide: CLOCK, useValue: fixedClock },
      ],
    }).compile();
  }

  async function createService(env: Record<string, string> = {}) {
    const module: TestingModule = await createModule(env);
    return module.get<SlotSuggestionService>(SlotSuggestionService);
  }

  const existing = (...ranges: Array<[string, string]>): readonly Occurrence[] =>
    ranges.flatMap((range, index) =>
      bookingFixture({ id: `existing-${index}`, ranges: [range] }).occurrences,
    );

  it('should step forward past busy blocks', async () => {
    const service = await createService();

    const suggestions = service.suggest(
      'new',
      utcRange('2025-01-10T10:30:00Z', '2025-01-10T11:30:00Z'),
      null,
      existing(
        ['2025-01-10T10:00:00Z', '2025-01-10T11:00:00Z'],
        ['2025-01-10T11:30:00Z', '2025-01-10T13:00:00Z'],
      ),
    );

    expect(starts(suggestions)).toEqual([
      '2025-01-10T13:30:00.000Z',
      '2025-01-10T14:30:00.000Z',
      '2025-01-10T15:30:00.000Z',
    ]);
    expect(suggestions[0].end.toISOString()).toBe('2025-01-10T14:30:00.000Z');
  });

  it('should honour the configured step and limit', async () => {
    const service = await createService({
      SUGGESTION_STEP_MINUTES: '15',
      MAX_SUGGESTIONS: '2',
    });

    const suggestions = service.suggest(
      'new',
      utcRange('2025-01-10T10:00:00Z', '2025-01-10T10:30:00Z'),
      null,
      existing(['2025-01-10T10:00:00Z', '2025-01-10T10:45:00Z']),
    );

    expect(starts(suggestions)).toEqual([
      '2025-01-10T10:45:00.000Z',
      '2025-01-10T11:00:00.000Z',
    ]);
  });

  it('should check every occurrence of a recurring request', async () => {
    const service = await createService({ MAX_SUGGESTIONS: '1' });

    const suggestions = service.suggest(
      'new',
      utcRange('2025-01-06T09:00:00Z', '2025-01-06T10:00:00Z'),
      {
        frequency: RecurrenceFrequency.Weekly,
        interval: 1,
        endDate: null,
        count: 2,
        daysOfWeek: [],
      },
      existing(['2025-01-13T10:00:00Z', '2025-01-13T11:00:00Z']),
    );

    expect(starts(suggestions)).toEqual(['2025-01-06T11:00:00.000Z']);
  });

  it('should skip slots that start in the past', async () => {
    const service = await createService({ MAX_SUGGESTIONS: '1' });

    const suggestions = service.suggest(
      'new',
      utcRange('2024-12-31T22:30:00Z', '2024-12-31T23:30:00Z'),
      null,
      [],
    );

    expect(starts(suggestions)).toEqual(['2025-01-01T00:30:00.000Z']);
  });

  it('should stop once the series would end before it starts', async () => {
    const service = await createService();

    const suggestions = service.suggest(
      'new',
      utcRange('2025-01-06T09:00:00Z', '2025-01-06T10:00:00Z'),
      {
        frequency: RecurrenceFrequency.Daily,
        interval: 1,
        endDate: new Date('2025-01-06T12:00:00Z'),
        count: null,
        daysOfWeek: [],
      },
      existing(['2025-01-06T09:00:00Z', '2025-01-06T14:00:00Z']),
    );

    expect(suggestions).toEqual([]);
  });

  it('should return nothing when suggestions are disabled', async () => {
    const service = await createService({ MAX_SUGGESTIONS: '0' });

    expect(
      service.suggest(
        'new',
        utcRange('2025-01-10T10:00:00Z', '2025-01-10T11:00:00Z'),
        null,
        existing(['2025-01-10T10:00:00Z', '2025-01-10T11:00:00Z']),
      ),
    ).toEqual([]);
  });

  it('should jump past a long occupant in a single attempt', async () => {
    const module = await createModule();
    const service = module.get<SlotSuggestionService>(SlotSuggestionService);
    const expand = jest.spyOn(module.get<RecurrenceService>(RecurrenceService), 'expand');

    const suggestions = service.suggest(
      'new',
      utcRange('2025-01-02T09:00:00Z', '2025-01-02T10:00:00Z'),
      {
        frequency: RecurrenceFrequency.Daily,
        interval: 1,
        endDate: null,
        count: 500,
        daysOfWeek: [],
      },
      existing(['2025-01-01T00:00:00Z', '2026-12-01T00:00:00Z']),
    );

    expect(suggestions).toEqual([]);
    expect(expand).toHaveBeenCalledTimes(1);
  });

  it('should stop after the configured number of attempts', async () => {
    const module = await createModule({ SUGGESTION_MAX_ATTEMPTS: '2' });
    const service = module.get<SlotSuggestionService>(SlotSuggestionService);
    const expand = jest.spyOn(module.get<RecurrenceService>(RecurrenceService), 'expand');

    const suggestions = service.suggest(
      'new',
      utcRange('2025-01-10T10:00:00Z', '2025-01-10T11:00:00Z'),
      null,
      existing(
        ['2025-01-10T11:00:00Z', '2025-01-10T12:00:00Z'],
        ['2025-01-10T12:00:00Z', '2025-01-10T13:00:00Z'],
      ),
    );

    expect(suggestions).toEqual([]);
    expect(expand).toHaveBeenCalledTimes(2);
  });

  it('should stop once the occurrence budget is spent', async () => {
    const module = await createModule({
      MAX_OCCURRENCES: '10',
      SUGGESTION_OCCURRENCE_BUDGET: '20',
    });
    const service = module.get<SlotSuggestionService>(SlotSuggestionService);
    const expand = jest.spyOn(module.get<RecurrenceService>(RecurrenceService), 'expand');

    const suggestions = service.suggest(
      'new',
      utcRange('2025-01-10T10:00:00Z', '2025-01-10T11:00:00Z'),
      {
        frequency: RecurrenceFrequency.Daily,
        interval: 1,
        endDate: null,
        count: 10,
        daysOfWeek: [],
      },
      existing(
        ['2025-01-19T11:00:00Z', '2025-01-19T12:00:00Z'],
        ['2025-01-19T12:00:00Z', '2025-01-19T13:00:00Z'],
        ['2025-01-19T13:00:00Z', '2025-01-19T14:00:00Z'],
      ),
    );

    expect(suggestions).toEqual([]);
    expect(expand).toHaveBeenCalledTimes(2);
  });
});
