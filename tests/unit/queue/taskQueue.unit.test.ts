import { LifecycleError, TelemetryError } from '../../../src/errors/types';
import { TaskQueue } from '../../../src/queue/taskQueue';
import { sleep } from '../../_utils/fakes';

const nextTick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('TaskQueue', () => {
  test('units never run on the submitter stack', async () => {
    const queue = new TaskQueue();
    let ran = false;

    queue.submit('flag', () => {
      ran = true;
    });
    expect(ran).toBe(false);

    await queue.drain();
    expect(ran).toBe(true);
  });

  test('concurrent submitters observe one total order with no overlap', async () => {
    const queue = new TaskQueue();
    const submitted: string[] = [];
    const executed: string[] = [];
    let active = 0;
    let maxActive = 0;

    async function submitter(id: string, count: number): Promise<void> {
      for (let i = 0; i < count; i++) {
        const marker = `${id}-${i}`;
        submitted.push(marker);
        queue.submit(marker, async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await sleep(1);
          executed.push(marker);
          active--;
        });
        await nextTick();
      }
    }

    await Promise.all(['a', 'b', 'c'].map(id => submitter(id, 5)));
    await queue.drain();

    expect(executed).toEqual(submitted);
    expect(maxActive).toBe(1);
  });

  test('a failing unit is reported and later units still run', async () => {
    const reported: Array<{ error: TelemetryError; unit: string }> = [];
    const queue = new TaskQueue({ onError: (error, unit) => reported.push({ error, unit }) });
    const order: string[] = [];

    queue.submit('boom', () => {
      throw new Error('boom');
    });
    queue.submit('after', () => {
      order.push('after');
    });
    await queue.drain();

    expect(order).toEqual(['after']);
    expect(reported).toHaveLength(1);
    expect(reported[0]?.unit).toBe('boom');
    expect(reported[0]?.error).toMatchObject({ code: 'UNKNOWN_ERROR', message: 'boom' });
    expect(queue.getStats()).toEqual({ submitted: 2, completed: 1, failed: 1, timedOut: 0, pending: 0 });
  });

  test('a throwing onError callback does not stop the lane', async () => {
    const queue = new TaskQueue({
      onError: () => {
        throw new Error('callback failed');
      },
    });
    let ran = false;

    queue.submit('boom', () => Promise.reject(new Error('boom')));
    queue.submit('after', () => {
      ran = true;
    });
    await queue.drain();

    expect(ran).toBe(true);
  });

  test('close drains pending work, including work submitted while draining', async () => {
    const queue = new TaskQueue();
    const order: string[] = [];

    queue.submit('outer', () => {
      order.push('outer');
      queue.submit('inner', () => {
        order.push('inner');
      });
    });
    await queue.close();

    expect(order).toEqual(['outer', 'inner']);
    expect(queue.isClosed()).toBe(true);
  });

  test('refuses submissions once closed', async () => {
    const queue = new TaskQueue();
    await queue.close();

    expect(() => queue.submit('late', () => undefined)).toThrow(LifecycleError);
    expect(() => queue.submit('late', () => undefined))
      .toThrow("Cannot submit 'late': the task queue has been shut down");
    expect(queue.getStats().submitted).toBe(0);
  });

  test('reports pending units', () => {
    const queue = new TaskQueue();

    queue.submit('one', () => undefined);
    queue.submit('two', () => undefined);

    expect(queue.getStats()).toEqual({ submitted: 2, completed: 0, failed: 0, timedOut: 0, pending: 2 });
    return queue.drain();
  });

  describe('with a timeout', () => {
    test('an overrunning unit is reported but keeps the lane', async () => {
      const reported: Array<{ code: string; unit: string }> = [];
      const queue = new TaskQueue({ timeout: 20, onError: (error, unit) => reported.push({ code: error.code, unit }) });
      const order: string[] = [];
      let active = 0;
      let maxActive = 0;

      for (const name of ['slow-1', 'slow-2']) {
        queue.submit(name, async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await sleep(60);
          order.push(name);
          active--;
        });
      }
      await queue.drain();

      expect(maxActive).toBe(1);
      expect(order).toEqual(['slow-1', 'slow-2']);
      expect(reported).toEqual([
        { code: 'TASK_TIMEOUT', unit: 'slow-1' },
        { code: 'TASK_TIMEOUT', unit: 'slow-2' },
      ]);
      expect(queue.getStats()).toEqual({ submitted: 2, completed: 2, failed: 0, timedOut: 2, pending: 0 });
    });

    test('an overrunning unit that then fails is counted once', async () => {
      const codes: string[] = [];
      const queue = new TaskQueue({ timeout: 20, onError: error => codes.push(error.code) });

      queue.submit('slow-failure', async () => {
        await sleep(60);
        throw new Error('late failure');
      });
      await queue.drain();

      const { submitted, completed, failed, timedOut } = queue.getStats();
      expect(codes).toEqual(['TASK_TIMEOUT', 'UNKNOWN_ERROR']);
      expect({ submitted, completed, failed, timedOut }).toEqual({ submitted: 1, completed: 0, failed: 1, timedOut: 1 });
      expect(completed + failed).toBe(submitted);
    });

    test('units finishing in time are not reported', async () => {
      const onError = jest.fn();
      const queue = new TaskQueue({ timeout: 50, onError });

      queue.submit('quick', () => sleep(5));
      await queue.drain();
      await sleep(60);

      expect(onError).not.toHaveBeenCalled();
      expect(queue.getStats().timedOut).toBe(0);
    });

    test('close waits for an overrunning unit', async () => {
      const queue = new TaskQueue({ timeout: 10 });
      let finished = false;

      queue.submit('slow', async () => {
        await sleep(50);
        finished = true;
      });
      await queue.close();

      expect(finished).toBe(true);
    });
  });
});
