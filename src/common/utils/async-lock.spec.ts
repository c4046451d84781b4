import { AsyncLock } from './async-lock';

describe('AsyncLock', () => {
  it('should run tasks in the order they were queued', async () => {
    const lock = new AsyncLock();
    const order: number[] = [];

    await Promise.all([
      lock.runExclusive(async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push(1);
      }),
      lock.runExclusive(async () => {
        order.push(2);
      }),
      lock.runExclusive(async () => {
        order.push(3);
      }),
    ]);

    expect(order).toEqual([1, 2, 3]);
  });

  it('should keep going after a task rejects', async () => {
    const lock = new AsyncLock();

    const failed = lock.runExclusive(async () => {
      throw new Error('task failed');
    });
    const next = lock.runExclusive(async () => 'next');

    await expect(failed).rejects.toThrow('task failed');
    await expect(next).resolves.toBe('next');
  });
});
