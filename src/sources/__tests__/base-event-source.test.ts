import { BaseEventSource } from '../base-event-source';

class ScriptedSource extends BaseEventSource {
  streams = 0;
  failNextStart = false;

  constructor() {
    super(5, 'scripted');
  }

  get running(): boolean {
    return this.isRunning;
  }

  protected async startStreaming(): Promise<void> {
    if (this.failNextStart) {
      this.failNextStart = false;
      throw new Error('endpoint refused connection');
    }
    this.streams++;
  }

  protected async stopStreaming(): Promise<void> {
    this.streams--;
  }
}

describe('BaseEventSource', () => {
  test('a failed start surfaces the error and leaves the source stopped', async () => {
    const source = new ScriptedSource();
    source.failNextStart = true;

    await expect(source.start()).rejects.toThrow('endpoint refused connection');
    expect(source.running).toBe(false);

    await source.start();
    expect(source.running).toBe(true);
    expect(source.streams).toBe(1);
  });

  test('a second start is a no-op', async () => {
    const source = new ScriptedSource();
    await source.start();
    await source.start();
    expect(source.streams).toBe(1);

    await source.stop();
    expect(source.running).toBe(false);
    expect(source.streams).toBe(0);
  });
});
