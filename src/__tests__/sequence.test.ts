import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DEFAULT_FRAME_MS,
  parseStepRecord,
  parseFrameRecord,
  parseStepRecords,
  parseFrameRecords,
  toStepRecord,
} from '../sequence/loader';
import { checkStep } from '../sequence/schema';
import { sanitizeInputs, neutralVector, clampAxis } from '../sequence/input-vector';
import { SequenceEntry, snapshotSequence } from '../sequence/types';

describe('parseStepRecord', () => {
  it('reads wait, key and expect records', () => {
    assert.deepEqual(parseStepRecord({ type: 'wait', seconds: 0.2 }), { kind: 'wait', seconds: 0.2 });
    assert.deepEqual(
      parseStepRecord({ type: 'key', key: 'space', action: 'press' }),
      { kind: 'key', key: 'space', action: 'press' },
    );
    assert.deepEqual(
      parseStepRecord({ type: 'expect', text: 'Jump now', expect: 'jump' }),
      { kind: 'expect', label: 'Jump now', expected: 'jump' },
    );
  });

  it('coerces numeric strings for wait seconds', () => {
    assert.deepEqual(parseStepRecord({ type: 'wait', seconds: '0.5' }), { kind: 'wait', seconds: 0.5 });
  });

  it('uses the expected label when an expect record has no text', () => {
    assert.deepEqual(
      parseStepRecord({ type: 'expect', expect: 'stick up' }),
      { kind: 'expect', label: 'stick up', expected: 'stick up' },
    );
  });

  it('turns unreadable records into malformed entries', () => {
    const negative = parseStepRecord({ type: 'wait', seconds: -1 });
    assert.equal(negative.kind, 'malformed');
    assert.ok(negative.kind === 'malformed' && negative.reason.startsWith('seconds:'));

    const unknown = parseStepRecord({ type: 'dance' });
    assert.equal(unknown.kind, 'malformed');
    assert.ok(unknown.kind === 'malformed' && unknown.reason.startsWith('type:'));

    const badAction = parseStepRecord({ type: 'key', key: 'a', action: 'tap' });
    assert.equal(badAction.kind, 'malformed');
  });

  it('keeps the raw record on malformed entries', () => {
    const raw = { type: 'dance', moves: 3 };
    const entry = parseStepRecord(raw);
    assert.ok(entry.kind === 'malformed');
    assert.equal(entry.raw, raw);
  });
});

describe('parseFrameRecord', () => {
  it('defaults a missing duration', () => {
    assert.deepEqual(parseFrameRecord({ inputs: { jump: true } }), {
      kind: 'frame',
      durationMs: DEFAULT_FRAME_MS,
      inputs: { jump: true },
    });
  });

  it('rounds durations and keeps them at 1 ms or more', () => {
    const rounded = parseFrameRecord({ dt_ms: 12.6 });
    assert.ok(rounded.kind === 'frame');
    assert.equal(rounded.durationMs, 13);

    const zero = parseFrameRecord({ dt_ms: 0 });
    assert.ok(zero.kind === 'frame');
    assert.equal(zero.durationMs, 1);
  });

  it('clamps axes and drops non-input values', () => {
    const frame = parseFrameRecord({ dt_ms: 40, inputs: { throttle: 2, steer: -3, jump: true, label: 'x' } });
    assert.deepEqual(frame, {
      kind: 'frame',
      durationMs: 40,
      inputs: { throttle: 1, steer: -1, jump: true },
    });
  });

  it('marks non-object records malformed', () => {
    assert.equal(parseFrameRecord(5).kind, 'malformed');
    assert.equal(parseFrameRecord({ dt_ms: '80' }).kind, 'malformed');
  });
});

describe('record lists', () => {
  it('treats non-arrays as empty', () => {
    assert.deepEqual(parseStepRecords(undefined), []);
    assert.deepEqual(parseFrameRecords({ dt_ms: 80 }), []);
  });

  it('writes entries back to persisted records', () => {
    const records = parseStepRecords([
      { type: 'wait', seconds: 1 },
      { type: 'expect', text: 'Boost', expect: 'boost' },
      { type: 'bogus' },
    ]).map(toStepRecord);
    assert.deepEqual(records, [
      { type: 'wait', seconds: 1 },
      { type: 'expect', text: 'Boost', expect: 'boost' },
      { type: 'bogus' },
    ]);

    const frames = parseFrameRecords([{ dt_ms: 30, inputs: { yaw: 0.5 } }]).map(toStepRecord);
    assert.deepEqual(frames, [{ dt_ms: 30, inputs: { yaw: 0.5 } }]);
  });
});

describe('checkStep', () => {
  it('accepts well-formed steps', () => {
    const check = checkStep({ kind: 'key', key: 'f6', action: 'release' });
    assert.deepEqual(check, { ok: true, step: { kind: 'key', key: 'f6', action: 'release' } });
  });

  it('rejects steps with invalid fields', () => {
    assert.equal(checkStep({ kind: 'wait', seconds: Number.NaN }).ok, false);
    assert.equal(checkStep({ kind: 'frame', durationMs: 0, inputs: {} }).ok, false);
    assert.equal(checkStep({ kind: 'expect', label: 'x', expected: '' }).ok, false);
    assert.equal(checkStep(null).ok, false);
  });

  it('reports the reason carried by a malformed entry', () => {
    assert.deepEqual(checkStep({ kind: 'malformed', reason: 'bad record', raw: null }), {
      ok: false,
      reason: 'bad record',
    });
  });
});

describe('input vectors', () => {
  it('clamps axes and maps NaN to 0', () => {
    assert.equal(clampAxis(1.5), 1);
    assert.equal(clampAxis(-2), -1);
    assert.equal(clampAxis(Number.NaN), 0);
  });

  it('sanitizes raw inputs', () => {
    assert.deepEqual(
      sanitizeInputs({ pitch: 0.25, boost: false, roll: Number.POSITIVE_INFINITY, note: 'x' }),
      { pitch: 0.25, boost: false },
    );
  });

  it('builds a neutral vector', () => {
    assert.deepEqual(neutralVector(['throttle'], ['jump']), { throttle: 0, jump: false });
  });
});

describe('snapshotSequence', () => {
  it('copies entries so later edits do not leak into a run', () => {
    const source: SequenceEntry[] = [
      { kind: 'frame', durationMs: 80, inputs: { jump: true } },
      { kind: 'wait', seconds: 1 },
    ];
    const copy = snapshotSequence(source);

    const frame = source[0];
    assert.ok(frame.kind === 'frame');
    frame.inputs.jump = false;
    source.push({ kind: 'wait', seconds: 9 });

    assert.deepEqual(copy, [
      { kind: 'frame', durationMs: 80, inputs: { jump: true } },
      { kind: 'wait', seconds: 1 },
    ]);
  });
});
