import { CallEventQueue } from './call-event-queue.js';
import type { CallEvent } from '../types/index.js';

describe('CallEventQueue', () => {
  it('should deliver buffered events in order', async () => {
    const queue = new CallEventQueue();
    queue.say('hello');
    queue.push({ type: 'end' });
    queue.close();

    const received: CallEvent[] = [];
    for await (const event of queue) {
      received.push(event);
    }

    expect(received).toEqual([
      { type: 'utterance', role: 'user', text: 'hello' },
      { type: 'end' },
    ]);
  });

  it('should resolve a waiting consumer when an event arrives', async () => {
    const queue = new CallEventQueue();
    const pending = queue.next();

    queue.say('are you there?');

    await expect(pending).resolves.toEqual({
      value: { type: 'utterance', role: 'user', text: 'are you there?' },
      done: false,
    });
  });

  it('should deliver each event once across consumers', async () => {
    const queue = new CallEventQueue();
    const first = queue.next();
    const second = queue.next();

    queue.say('one');
    queue.say('two');

    expect((await first).value).toEqual({ type: 'utterance', role: 'user', text: 'one' });
    expect((await second).value).toEqual({ type: 'utterance', role: 'user', text: 'two' });
  });

  it('should complete waiting consumers on close', async () => {
    const queue = new CallEventQueue();
    const pending = queue.next();

    queue.close();

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
    expect(queue.isClosed).toBe(true);
  });

  it('should reject pushes after close', () => {
    const queue = new CallEventQueue();
    queue.close();

    expect(() => queue.say('late')).toThrow('Cannot push to a closed call event queue');
  });

  it('should drop buffered events on return', async () => {
    const queue = new CallEventQueue();
    queue.say('unread');

    await queue.return();

    await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
  });
});
