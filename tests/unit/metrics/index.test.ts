import {
  createWatchdogState,
  getCounters,
  recordCounter,
  resetCounters,
  runWatchdogTick,
} from "../../../src/metrics";

describe("counters", () => {
  beforeEach(() => resetCounters());

  it("records and resets", () => {
    recordCounter("framesIngested");
    recordCounter("framesIngested", 4);
    recordCounter("gapsReleased");
    expect(getCounters().framesIngested).toBe(5);
    expect(getCounters().gapsReleased).toBe(1);
    resetCounters();
    expect(getCounters().framesIngested).toBe(0);
  });

  it("returns a copy", () => {
    const snapshot = getCounters();
    recordCounter("streamsCreated");
    expect(snapshot.streamsCreated).toBe(0);
  });
});

describe("runWatchdogTick", () => {
  const config = { intervalMs: 1000, gatewayFailCountBeforeRestart: 3, ingestFailCountBeforeRestart: 2 };

  it("fires the gateway callback after consecutive failures, then starts counting again", () => {
    const state = createWatchdogState();
    const onGatewayUnhealthy = jest.fn();
    for (let i = 0; i < 2; i++) runWatchdogTick(state, config, { onGatewayUnhealthy }, { gateway: () => false });
    expect(onGatewayUnhealthy).not.toHaveBeenCalled();
    runWatchdogTick(state, config, { onGatewayUnhealthy }, { gateway: () => false });
    expect(onGatewayUnhealthy).toHaveBeenCalledTimes(1);
    expect(state.gatewayFailCount).toBe(0);
  });

  it("resets the count on a healthy check", () => {
    const state = createWatchdogState();
    const onGatewayUnhealthy = jest.fn();
    runWatchdogTick(state, config, { onGatewayUnhealthy }, { gateway: () => false });
    runWatchdogTick(state, config, { onGatewayUnhealthy }, { gateway: () => false });
    runWatchdogTick(state, config, { onGatewayUnhealthy }, { gateway: () => true });
    runWatchdogTick(state, config, { onGatewayUnhealthy }, { gateway: () => false });
    expect(onGatewayUnhealthy).not.toHaveBeenCalled();
    expect(state.gatewayFailCount).toBe(1);
  });

  it("reports stalled ingestion independently of the gateway", () => {
    const state = createWatchdogState();
    const onIngestStalled = jest.fn();
    const onGatewayUnhealthy = jest.fn();
    const checks = { gateway: () => true, ingest: () => false };
    runWatchdogTick(state, config, { onIngestStalled, onGatewayUnhealthy }, checks);
    runWatchdogTick(state, config, { onIngestStalled, onGatewayUnhealthy }, checks);
    expect(onIngestStalled).toHaveBeenCalledTimes(1);
    expect(onGatewayUnhealthy).not.toHaveBeenCalled();
  });

  it("never fires without a threshold", () => {
    const state = createWatchdogState();
    const onGatewayUnhealthy = jest.fn();
    for (let i = 0; i < 10; i++) runWatchdogTick(state, { intervalMs: 1000 }, { onGatewayUnhealthy }, { gateway: () => false });
    expect(onGatewayUnhealthy).not.toHaveBeenCalled();
    expect(state.gatewayFailCount).toBe(10);
  });
});
