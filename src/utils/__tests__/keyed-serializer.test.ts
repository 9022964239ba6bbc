import { KeyedSerializer } from '../keyed-serializer';
import { sleep } from '../retry';

describe('KeyedSerializer', () => {
  test('runs tasks on one key in order, one at a time', async () => {
    const serializer = new KeyedSerializer();
    const log: string[] = [];
    let running = 0;
    let maxRunning = 0;

    const task = (name: string, delayMs: number) => async () => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      log.push(`start ${name}`);
      await sleep(delayMs);
      log.push(`end ${name}`);
      running--;
      return name;
    };

    const results = await Promise.all([
      serializer.run('a', task('first', 10)),
      serializer.run('a', task('second', 1)),
      serializer.run('a', task('third', 1))
    ]);

    expect(results).toEqual(['first', 'second', 'third']);
    expect(maxRunning).toBe(1);
    expect(log).toEqual(['start first', 'end first', 'start second', 'end second', 'start third', 'end third']);
  });

  test('different keys run concurrently', async () => {
    const serializer = new KeyedSerializer();
    let running = 0;
    let maxRunning = 0;

    const task = async () => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await sleep(10);
      running--;
    };

    await Promise.all([serializer.run('a', task), serializer.run('b', task)]);
    expect(maxRunning).toBe(2);
  });

  test('a failing task does not block the key', async () => {
    const serializer = new KeyedSerializer();

    await expect(serializer.run('a', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(serializer.run('a', async () => 'next')).resolves.toBe('next');
  });

  test('drops a key once it drains', async () => {
    const serializer = new KeyedSerializer();
    const pending = serializer.run('a', () => sleep(5));

    expect(serializer.isBusy('a')).toBe(true);
    expect(serializer.activeKeys).toBe(1);
    await pending;
    expect(serializer.isBusy('a')).toBe(false);
    expect(serializer.activeKeys).toBe(0);
  });
});
