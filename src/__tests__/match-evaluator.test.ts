import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { matchesInput } from '../match/evaluator';
import { Snapshot } from '../input/snapshot';

function snap(pressed: string[] = [], x = 0, y = 0): Snapshot {
  return { pressed: new Set(pressed), axes: [x, y], timestamp: 1 };
}

describe('matchesInput', () => {
  it('matches a label that is in the pressed set', () => {
    assert.equal(matchesInput('jump', snap(['jump'])), true);
    assert.equal(matchesInput('jump', snap(['boost'])), false);
  });

  it('matches pressed labels exactly', () => {
    assert.equal(matchesInput('Jump', snap(['jump'])), false);
  });

  it('detects stick up when y is below the negative threshold', () => {
    assert.equal(matchesInput('stick up', snap([], 0, -0.7)), true);
    assert.equal(matchesInput('stick up', snap([], 0, -0.6)), false);
    assert.equal(matchesInput('stick up', snap([], 0, 0.9)), false);
  });

  it('detects stick down when y is above the threshold', () => {
    assert.equal(matchesInput('stick down', snap([], 0, 0.61)), true);
    assert.equal(matchesInput('stick down', snap([], 0, 0.5)), false);
  });

  it('detects diagonals on both axes', () => {
    assert.equal(matchesInput('diagonal', snap([], 0.6, -0.6)), true);
    assert.equal(matchesInput('diagonal', snap([], -0.56, 0.56)), true);
    assert.equal(matchesInput('diagonal', snap([], 0.9, 0.2)), false);
  });

  it('normalizes heuristic labels', () => {
    assert.equal(matchesInput('Stick_Up', snap([], 0, -0.8)), true);
    assert.equal(matchesInput(' stick-down ', snap([], 0, 0.8)), true);
    assert.equal(matchesInput('DIAGONAL', snap([], 0.7, 0.7)), true);
  });

  it('returns false for unknown labels on a neutral snapshot', () => {
    assert.equal(matchesInput('wavedash', snap()), false);
  });

  it('honours custom thresholds', () => {
    const thresholds = { stickThreshold: 0.3, diagonalThreshold: 0.2 };
    assert.equal(matchesInput('stick up', snap([], 0, -0.4), thresholds), true);
    assert.equal(matchesInput('diagonal', snap([], 0.25, 0.25), thresholds), true);
  });
});
