import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Lane } from '../lane.js';

describe('Lane', () => {
  it('runs tasks one at a time in arrival order', async () => {
    const lane = new Lane();
    const order: string[] = [];
    const release = await lane.acquire();

    const second = lane.run(async () => {
      order.push('second');
    });
    const third = lane.run(async () => {
      order.push('third');
    });
    order.push('first');
    release();

    await Promise.all([second, third]);
    assert.deepEqual(order, ['first', 'second', 'third']);
  });

  it('releases the lane when a task fails', async () => {
    const lane = new Lane();
    await assert.rejects(
      lane.run(async () => {
        throw new Error('boom');
      }),
      /boom/,
    );
    assert.equal(await lane.run(async () => 'after'), 'after');
  });
});
