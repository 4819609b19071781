import { ResultChannel } from './result-channel';

describe('ResultChannel', () => {
  it('hands buffered values out in push order', async () => {
    const ch = new ResultChannel<number>();
    ch.push(1);
    ch.push(2);
    ch.close();

    const seen: number[] = [];
    for await (const v of ch) seen.push(v);
    expect(seen).toEqual([1, 2]);
  });

  it('wakes a waiting reader on push', async () => {
    const ch = new ResultChannel<string>();
    const next = ch.next();
    ch.push('a');
    await expect(next).resolves.toEqual({ value: 'a', done: false });
  });

  it('ends waiting readers on close', async () => {
    const ch = new ResultChannel<string>();
    const next = ch.next();
    ch.close();
    await expect(next).resolves.toEqual({ value: undefined, done: true });
    expect(ch.isClosed).toBe(true);
  });

  it('drains buffered values before surfacing a close error', async () => {
    const ch = new ResultChannel<number>();
    ch.push(7);
    ch.close(new Error('worker crashed'));

    await expect(ch.next()).resolves.toEqual({ value: 7, done: false });
    await expect(ch.next()).rejects.toThrow('worker crashed');
  });

  it('rejects pushes after close', () => {
    const ch = new ResultChannel<number>();
    ch.close();
    expect(() => ch.push(1)).toThrow('Cannot push to a closed channel');
  });
});
