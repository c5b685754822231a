import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { effectiveDailyCap, partitionByDay } from '../modules/scheduler/schedule-partition';
import { phones } from './support/in-memory-store';

describe('partitionByDay', () => {
  it('spreads 10,000 recipients at 250 a day over 40 days', () => {
    const partition = partitionByDay(phones(10_000), 250, '2025-06-01');

    assert.equal(partition.days, 40);
    assert.equal(partition.firstDate, '2025-06-01');
    assert.equal(partition.lastDate, '2025-07-10');
    assert.equal(partition.rows[0]?.scheduledDate, '2025-06-01');
    assert.equal(partition.rows[249]?.scheduledDate, '2025-06-01');
    assert.equal(partition.rows[250]?.scheduledDate, '2025-06-02');
    assert.equal(partition.rows[9_999]?.scheduledDate, '2025-07-10');
  });

  it('never puts more than the cap on one date and uses ceil(N/D) dates', () => {
    for (const [count, cap] of [
      [1, 1],
      [7, 3],
      [250, 250],
      [251, 250],
      [999, 100]
    ] as const) {
      const partition = partitionByDay(phones(count), cap, '2025-06-01');
      const perDate = new Map<string, number>();
      for (const row of partition.rows) {
        perDate.set(row.scheduledDate, (perDate.get(row.scheduledDate) ?? 0) + 1);
      }

      assert.equal(perDate.size, Math.ceil(count / cap));
      assert.ok([...perDate.values()].every((size) => size <= cap));
    }
  });

  it('keeps resolver order in positions', () => {
    const partition = partitionByDay(['+1', '+2', '+3'], 2, '2025-06-01');
    assert.deepEqual(
      partition.rows.map((row) => [row.phone, row.position, row.scheduledDate]),
      [
        ['+1', 0, '2025-06-01'],
        ['+2', 1, '2025-06-01'],
        ['+3', 2, '2025-06-02']
      ]
    );
  });

  it('returns no dates for an empty audience', () => {
    const partition = partitionByDay([], 250, '2025-06-01');
    assert.equal(partition.days, 0);
    assert.equal(partition.firstDate, null);
    assert.equal(partition.lastDate, null);
  });

  it('rejects a non-positive cap', () => {
    assert.throws(() => partitionByDay(['+1'], 0, '2025-06-01'), RangeError);
  });

  it('caps campaign throughput at the global limit', () => {
    assert.equal(effectiveDailyCap(500, 250), 250);
    assert.equal(effectiveDailyCap(100, 250), 100);
  });
});
