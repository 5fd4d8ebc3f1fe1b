import { CommandPoller } from '../command-poller';
import { ControlProcessor } from '../control-processor';
import { TunableSettings } from '../tunable-settings';
import { AlertEngine } from '../alert-engine';
import { TrackerStatistics } from '../tracker-statistics';
import { ICommandSource } from '../interfaces';

describe('CommandPoller', () => {
  let fetchCommands: jest.Mock<Promise<string[]>, []>;
  let source: ICommandSource;
  let settings: TunableSettings;
  let processor: ControlProcessor;
  let sent: string[];
  let poller: CommandPoller;

  beforeEach(() => {
    fetchCommands = jest.fn();
    source = { fetchCommands };
    settings = new TunableSettings();
    sent = [];
    processor = new ControlProcessor({
      symbol: 'BTCUSDT',
      settings,
      alertState: new AlertEngine(),
      statistics: new TrackerStatistics(0),
      notifier: {
        send: async (text: string) => {
          sent.push(text);
          return true;
        },
      },
      clock: () => 1_700_000_000,
    });
    poller = new CommandPoller(source, processor, { pollIntervalMs: 2000 });
  });

  afterEach(async () => {
    await poller.stop();
    jest.useRealTimers();
  });

  it('handles every command from a poll in order', async () => {
    fetchCommands.mockResolvedValueOnce(['/z 4', '/vol 3']);
    const handled = jest.fn();
    poller.on('commandHandled', handled);

    await poller.start();

    expect(settings.snapshot().zThreshold).toBe(4);
    expect(settings.snapshot().volumeRatioThreshold).toBe(3);
    expect(sent).toEqual(['✅ Z-score threshold set to: 4', '✅ Volume multiplier set to: 3x']);
    expect(handled).toHaveBeenCalledTimes(2);
    expect(handled).toHaveBeenNthCalledWith(1, { kind: 'SetZThreshold', value: 4 });
  });

  it('polls again after the interval', async () => {
    jest.useFakeTimers();
    fetchCommands.mockResolvedValue([]);

    await poller.start();
    expect(fetchCommands).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1999);
    expect(fetchCommands).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(fetchCommands).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(2000);
    expect(fetchCommands).toHaveBeenCalledTimes(3);
  });

  it('stops polling once stopped', async () => {
    jest.useFakeTimers();
    fetchCommands.mockResolvedValue([]);

    await poller.start();
    await poller.stop();
    await jest.advanceTimersByTimeAsync(10000);

    expect(fetchCommands).toHaveBeenCalledTimes(1);
    expect(poller.isRunning()).toBe(false);
  });

  it('survives a failed poll and continues on the next cycle', async () => {
    fetchCommands.mockRejectedValueOnce(new Error('ETIMEDOUT'));
    fetchCommands.mockResolvedValueOnce(['/pause']);
    const failed = jest.fn();
    poller.on('pollFailed', failed);

    await poller.start();
    expect(failed).toHaveBeenCalledWith(expect.objectContaining({ message: 'ETIMEDOUT' }));
    expect(settings.snapshot().paused).toBe(false);

    await poller.pollOnce();
    expect(settings.snapshot().paused).toBe(true);
  });

  it('keeps handling later commands when one handler throws', async () => {
    const handle = jest.spyOn(processor, 'handle');
    handle.mockRejectedValueOnce(new Error('handler exploded'));
    fetchCommands.mockResolvedValueOnce(['/status', '/cooldown 90']);

    await poller.start();

    expect(handle).toHaveBeenCalledTimes(2);
    expect(settings.snapshot().cooldownSeconds).toBe(90);
  });

  it('does nothing when polled while stopped', async () => {
    await poller.pollOnce();
    expect(fetchCommands).not.toHaveBeenCalled();
  });
});
