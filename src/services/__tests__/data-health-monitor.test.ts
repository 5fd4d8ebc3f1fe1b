import { DataHealthMonitor } from '../data-health-monitor';

describe('DataHealthMonitor', () => {
  let monitor: DataHealthMonitor;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    monitor = new DataHealthMonitor({
      tradeStaleThresholdMs: 60_000,
      checkIntervalMs: 10_000,
    });
  });

  afterEach(() => {
    monitor.stop();
    jest.useRealTimers();
  });

  it('reports a silent trade stream once per stale period', () => {
    const stale = jest.fn();
    monitor.on('tradeDataStale', stale);
    monitor.start();

    jest.advanceTimersByTime(60_000);
    expect(stale).not.toHaveBeenCalled();

    jest.advanceTimersByTime(10_000);
    expect(stale).toHaveBeenCalledTimes(1);
    expect(stale).toHaveBeenCalledWith(
      expect.objectContaining({ staleMs: 70_000, lastTradeReceivedAt: Date.parse('2024-01-01T00:00:00Z') })
    );

    jest.advanceTimersByTime(30_000);
    expect(stale).toHaveBeenCalledTimes(1);
  });

  it('stays quiet while trades keep arriving', () => {
    const stale = jest.fn();
    monitor.on('tradeDataStale', stale);
    monitor.start();

    for (let i = 0; i < 12; i++) {
      jest.advanceTimersByTime(10_000);
      monitor.trackTrade();
    }

    expect(stale).not.toHaveBeenCalled();
  });

  it('reports again after the stream recovers and stalls a second time', () => {
    const stale = jest.fn();
    monitor.on('tradeDataStale', stale);
    monitor.start();

    jest.advanceTimersByTime(70_000);
    monitor.trackTrade();
    jest.advanceTimersByTime(70_000);

    expect(stale).toHaveBeenCalledTimes(2);
  });

  it('detects a gap between checks as a system resume', () => {
    const resumed = jest.fn();
    monitor.on('systemResumeDetected', resumed);
    monitor.start();

    // simulate a suspended host: wall clock jumps without the interval firing
    jest.setSystemTime(Date.now() + 45_000);
    monitor.evaluate();

    expect(resumed).toHaveBeenCalledWith(expect.objectContaining({ gapMs: 45_000, checkIntervalMs: 10_000 }));
  });
});
