// test/shift/shifter.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DATE_TOKEN_SOURCE, DateShifter, shiftDate } from '../../src/shift/shifter.js';
import { SeededRandom } from '../../src/random/rng.js';
import { daysBetween } from '../../src/dates/calendar.js';
import { parseDate } from '../../src/dates/format.js';
import { ConfigurationError, DateParseError, UnexpectedShiftError } from '../../src/errors.js';
import { createRecordingLogger } from '../../src/log.js';
import { ScriptedRandom } from '../helpers/random.js';

describe('shiftDate', () => {
  it('draws once from [-max, max] and adds the shift', () => {
    const random = new ScriptedRandom([5]);
    const outcome = shiftDate('2023-06-15', { maxShiftDays: 10 }, random);
    assert.deepEqual(outcome, { ok: true, value: '2023-06-20', shiftDays: 5 });
    assert.deepEqual(random.draws, [{ min: -10, max: 10 }]);
  });

  it('rolls over months and leap days', () => {
    const outcome = shiftDate('2024-02-27', { maxShiftDays: 30 }, new ScriptedRandom([3]));
    assert.deepEqual(outcome, { ok: true, value: '2024-03-01', shiftDays: 3 });
  });

  it('does not draw for a token that fails to parse', () => {
    const random = new ScriptedRandom([]);
    const outcome = shiftDate('2023-02-30', { maxShiftDays: 10 }, random);
    assert.equal(outcome.ok, false);
    assert.ok(!outcome.ok && outcome.error instanceof DateParseError);
    assert.equal(random.draws.length, 0);
  });

  it('reports arithmetic overflow as an unexpected error after drawing', () => {
    const random = new ScriptedRandom([1]);
    const outcome = shiftDate('9999-12-31', { maxShiftDays: 10 }, random);
    assert.ok(!outcome.ok && outcome.error instanceof UnexpectedShiftError);
    assert.equal(outcome.error.message, 'Error shifting date 9999-12-31: date value out of range');
    assert.equal(random.draws.length, 1);
  });

  it('renders with the configured format', () => {
    const outcome = shiftDate('2023-06-15', { maxShiftDays: 5, dateFormat: '%Y-%m-%d' }, new ScriptedRandom([-5]));
    assert.deepEqual(outcome, { ok: true, value: '2023-06-10', shiftDays: -5 });
  });
});

describe('DATE_TOKEN_SOURCE', () => {
  it('describes a bare YYYY-MM-DD token', () => {
    const re = new RegExp(`^${DATE_TOKEN_SOURCE}$`);
    assert.equal(re.test('2023-06-15'), true);
    assert.equal(re.test('2023-6-15'), false);
    assert.equal(re.test('15/06/2023'), false);
  });
});

describe('DateShifter', () => {
  it('rewrites each date in a line and leaves the rest alone', () => {
    const shifter = new DateShifter({ maxShiftDays: 10, random: new ScriptedRandom([3, -2]), logger: createRecordingLogger() });
    const out = shifter.shiftText('Visit on 2023-06-15 and again on 2023-07-01.');
    assert.equal(out, 'Visit on 2023-06-18 and again on 2023-06-29.');
    assert.deepEqual(shifter.stats, { matched: 2, shifted: 2, skipped: 0 });
  });

  it('gives the documented result for seed 42', () => {
    const shifter = new DateShifter({ maxShiftDays: 10, random: new SeededRandom(42), logger: createRecordingLogger() });
    const out = shifter.shiftText('Visit on 2023-06-15 and again on 2023-07-01.');
    assert.equal(out, 'Visit on 2023-06-17 and again on 2023-06-30.');
  });

  it('passes malformed dates through with a warning and keeps the stream intact', () => {
    const logger = createRecordingLogger();
    const random = new ScriptedRandom([7]);
    const shifter = new DateShifter({ maxShiftDays: 10, random, logger });
    const out = shifter.shiftText('2023-02-30 then 2023-01-01');
    assert.equal(out, '2023-02-30 then 2023-01-08');
    assert.equal(random.draws.length, 1);
    assert.deepEqual(shifter.stats, { matched: 2, shifted: 1, skipped: 1 });
    assert.deepEqual(logger.messages, [
      { level: 'warn', message: 'Invalid date format or value: 2023-02-30. day is out of range for month' },
    ]);
  });

  it('only scans YYYY-MM-DD tokens whatever the date format says', () => {
    const logger = createRecordingLogger();
    const random = new ScriptedRandom([]);
    const shifter = new DateShifter({ maxShiftDays: 10, dateFormat: '%d/%m/%Y', random, logger });
    const line = 'seen 2023-06-15, booked 15/06/2023';
    assert.equal(shifter.shiftText(line), line);
    assert.deepEqual(shifter.stats, { matched: 1, shifted: 0, skipped: 1 });
    assert.equal(random.draws.length, 0);
    assert.equal(logger.messages.length, 1);
    assert.equal(logger.messages[0].level, 'warn');
    assert.equal(
      logger.messages[0].message,
      "Invalid date format or value: 2023-06-15. time data '2023-06-15' does not match format '%d/%m/%Y'",
    );
  });

  it('logs unexpected failures at error level', () => {
    const logger = createRecordingLogger();
    const shifter = new DateShifter({ maxShiftDays: 10, random: new ScriptedRandom([5]), logger });
    assert.equal(shifter.shiftText('end of time 9999-12-31'), 'end of time 9999-12-31');
    assert.deepEqual(logger.messages, [
      { level: 'error', message: 'Error shifting date 9999-12-31: date value out of range' },
    ]);
  });

  it('passes a date through when the shift leaves the representable range', () => {
    const logger = createRecordingLogger();
    const shifter = new DateShifter({
      maxShiftDays: 1_000_000_000,
      random: new ScriptedRandom([500_000_000]),
      logger,
    });
    assert.equal(shifter.shiftText('on 2023-06-15'), 'on 2023-06-15');
    assert.deepEqual(shifter.stats, { matched: 1, shifted: 0, skipped: 1 });
    assert.deepEqual(logger.messages, [
      { level: 'error', message: 'Error shifting date 2023-06-15: date value out of range' },
    ]);
  });

  it('finds every date on repeated calls', () => {
    const shifter = new DateShifter({ maxShiftDays: 10, random: new ScriptedRandom([], 1), logger: createRecordingLogger() });
    assert.equal(shifter.shiftText('2023-01-01'), '2023-01-02');
    assert.equal(shifter.shiftText('2023-01-01'), '2023-01-02');
    assert.equal(shifter.shiftText('x 2023-01-01'), 'x 2023-01-02');
  });

  it('passes lines without dates through without drawing', () => {
    const random = new ScriptedRandom([]);
    const shifter = new DateShifter({ maxShiftDays: 10, random });
    for (const line of ['', 'no dates here\n', 'slashes 2023/06/15', 'short 23-06-15', '  \t\r\n']) {
      assert.equal(shifter.shiftText(line), line);
    }
    assert.equal(random.draws.length, 0);
    assert.deepEqual(shifter.stats, { matched: 0, shifted: 0, skipped: 0 });
  });

  it('preserves Unicode and punctuation around a date', () => {
    const shifter = new DateShifter({ maxShiftDays: 3, random: new ScriptedRandom([0]) });
    const line = 'Réunion — «2023-06-15» ✓\r\n';
    assert.equal(shifter.shiftText(line), line);
  });

  it('keeps every shifted date within the bound and parseable', () => {
    const max = 10;
    const shifter = new DateShifter({ maxShiftDays: max, random: new SeededRandom(2024), logger: createRecordingLogger() });
    const originals = Array.from({ length: 300 }, (_, i) => {
      const month = String((i % 12) + 1).padStart(2, '0');
      const day = String((i % 28) + 1).padStart(2, '0');
      return `${2000 + (i % 30)}-${month}-${day}`;
    });
    const out = shifter.shiftText(originals.join(' ')).split(' ');
    assert.equal(out.length, originals.length);
    out.forEach((shifted, i) => {
      const diff = daysBetween(parseDate(originals[i]), parseDate(shifted));
      assert.ok(Math.abs(diff) <= max, `${originals[i]} -> ${shifted} moved ${diff} days`);
    });
  });

  it('rejects a non-positive or fractional shift bound', () => {
    for (const maxShiftDays of [0, -1, 1.5]) {
      assert.throws(
        () => new DateShifter({ maxShiftDays, random: new ScriptedRandom([]) }),
        (err: unknown) => err instanceof ConfigurationError && err.message === 'max_shift_days must be a positive integer.',
      );
    }
  });
});
