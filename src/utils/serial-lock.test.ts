import { expect } from 'chai';
import { SerialLock } from './serial-lock.js';

describe('SerialLock', () => {
  it('never overlaps tasks', async () => {
    const lock = new SerialLock();
    let running = 0;
    let maxRunning = 0;

    await Promise.all(
      [5, 1, 3].map((delayMs) =>
        lock.run(async () => {
          running++;
          maxRunning = Math.max(maxRunning, running);
          await new Promise((resolve) => setTimeout(resolve, delayMs));
          running--;
        })
      )
    );

    expect(maxRunning).to.equal(1);
  });

  it('tracks queued tasks', async () => {
    const lock = new SerialLock();
    let release: () => void = () => undefined;
    const first = lock.run(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    const second = lock.run(async () => undefined);

    expect(lock.size).to.equal(2);
    await new Promise((resolve) => setImmediate(resolve));
    release();
    await Promise.all([first, second]);
    await new Promise((resolve) => setImmediate(resolve));

    expect(lock.size).to.equal(0);
  });
});
