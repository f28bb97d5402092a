import { describe, it, expect, beforeEach } from 'vitest';
import { ItemFinishState } from '../models/execution.js';
import { createEventCapture, FakeItem, itemMap, locators } from '../tests/helpers.js';
import { DirectedGraph } from '../utils/dag.js';
import { MemoryLogger } from '../utils/projectLogger.js';
import { ExecutionDriver } from './executionDriver.js';

let logger: MemoryLogger;

beforeEach(() => {
  logger = new MemoryLogger();
});

function chain(...names: string[]): DirectedGraph {
  const graph = new DirectedGraph();
  names.forEach((name, i) => {
    graph.addNode(name);
    if (i > 0) graph.addEdge(names[i - 1], name);
  });
  return graph;
}

describe('ExecutionDriver', () => {
  it('should run every permitted item in order and complete', async () => {
    const a = new FakeItem('A', { outputs: [{ kind: 'file', locator: 'a.txt' }] });
    const b = new FakeItem('B');
    const capture = createEventCapture();
    const driver = new ExecutionDriver({ graph: chain('A', 'B'), items: itemMap(a, b), logger, send: capture.send });

    expect(driver.state).toBe('not_started');
    const state = await driver.start(['A', 'B'], { A: true, B: true });

    expect(state).toBe('completed');
    expect(driver.state).toBe('completed');
    expect(locators(b.executions[0])).toEqual(['a.txt']);
    expect(capture.types()).toEqual(['item_started', 'item_finished', 'item_started', 'item_finished']);
  });

  it('should give each item only its direct predecessors resources', async () => {
    const a = new FakeItem('A', { outputs: [{ kind: 'file', locator: 'a.txt' }] });
    const b = new FakeItem('B', { outputs: [{ kind: 'file', locator: 'b.txt' }] });
    const c = new FakeItem('C');
    const driver = new ExecutionDriver({ graph: chain('A', 'B', 'C'), items: itemMap(a, b, c), logger });

    await driver.start(['A', 'B', 'C'], { A: true, B: true, C: true });

    expect(locators(c.executions[0])).toEqual(['b.txt']);
  });

  it('should stop at the first failed item', async () => {
    const a = new FakeItem('A', { result: ItemFinishState.FAILED });
    const b = new FakeItem('B');
    const driver = new ExecutionDriver({ graph: chain('A', 'B'), items: itemMap(a, b), logger });

    expect(await driver.start(['A', 'B'], { A: true, B: true })).toBe('failed');
    expect(b.executed).toBe(false);
  });

  it('should treat a thrown error as a failure', async () => {
    const a = new FakeItem('A', { throws: new Error('boom') });
    const driver = new ExecutionDriver({ graph: chain('A'), items: itemMap(a), logger });

    expect(await driver.start(['A'], { A: true })).toBe('failed');
    const entry = logger.entries.find((e) => e.event === 'Item execution threw');
    expect(entry?.data).toEqual({ item: 'A', error: 'boom' });
  });

  it('should end user_stopped when an item reports STOPPED', async () => {
    const a = new FakeItem('A', { result: ItemFinishState.STOPPED });
    const b = new FakeItem('B');
    const driver = new ExecutionDriver({ graph: chain('A', 'B'), items: itemMap(a, b), logger });

    expect(await driver.start(['A', 'B'], { A: true, B: true })).toBe('user_stopped');
    expect(b.executed).toBe(false);
  });

  it('should fail when a node has no item', async () => {
    const driver = new ExecutionDriver({ graph: chain('A'), items: new Map(), logger });

    expect(await driver.start(['A'], { A: true })).toBe('failed');
    expect(logger.events('error')).toEqual(['No project item for graph node']);
  });

  it('should refuse to run twice', async () => {
    const driver = new ExecutionDriver({ graph: new DirectedGraph(), items: new Map(), logger });
    await driver.start([], {});
    await expect(driver.start([], {})).rejects.toThrow('ExecutionDriver already used (state: completed)');
  });

  // --- selective execution ---

  describe('permits', () => {
    it('should visit a skipped item and pass its inputs through', async () => {
      const a = new FakeItem('A', { outputs: [{ kind: 'file', locator: 'a.txt' }] });
      const b = new FakeItem('B', { outputs: [{ kind: 'file', locator: 'b.txt' }] });
      const c = new FakeItem('C');
      const capture = createEventCapture();
      const driver = new ExecutionDriver({
        graph: chain('A', 'B', 'C'),
        items: itemMap(a, b, c),
        logger,
        send: capture.send,
      });

      const state = await driver.start(['A', 'B', 'C'], { A: true, B: false, C: true });

      expect(state).toBe('completed');
      expect(b.executed).toBe(false);
      expect(locators(c.executions[0])).toEqual(['b.txt', 'a.txt']);
      expect(capture.events.map((e) => ('name' in e ? `${e.type}:${e.name}` : e.type))).toEqual([
        'item_started:A',
        'item_finished:A',
        'item_skipped:B',
        'item_started:C',
        'item_finished:C',
      ]);
    });

    it('should treat a missing permit as not permitted', async () => {
      const a = new FakeItem('A');
      const driver = new ExecutionDriver({ graph: chain('A'), items: itemMap(a), logger });

      expect(await driver.start(['A'], {})).toBe('completed');
      expect(a.executed).toBe(false);
    });
  });

  // --- stop ---

  describe('stop', () => {
    it('should be a logged no-op before the run starts', () => {
      const driver = new ExecutionDriver({ graph: new DirectedGraph(), items: new Map(), logger });

      expect(driver.stop()).toBe(false);
      expect(driver.state).toBe('not_started');
      expect(logger.events('info')).toEqual(['No running item']);
    });

    it('should cancel the running item and end user_stopped', async () => {
      const a = new FakeItem('A', { blockUntilStopped: true });
      const b = new FakeItem('B');
      const driver = new ExecutionDriver({ graph: chain('A', 'B'), items: itemMap(a, b), logger });

      const run = driver.start(['A', 'B'], { A: true, B: true });
      await a.started;
      expect(driver.runningItem).toBe('A');
      expect(driver.stop()).toBe(true);

      expect(await run).toBe('user_stopped');
      expect(a.stopCalls).toBe(1);
      expect(b.executed).toBe(false);
    });

    it('should ignore a second stop during the same run', async () => {
      const a = new FakeItem('A', { blockUntilStopped: true });
      const driver = new ExecutionDriver({ graph: chain('A'), items: itemMap(a), logger });

      const run = driver.start(['A'], { A: true });
      await a.started;
      driver.stop();
      driver.stop();
      await run;
      expect(a.stopCalls).toBe(1);
    });

    it('should not start an item when the stop lands while it is being announced', async () => {
      const a = new FakeItem('A');
      const b = new FakeItem('B', { blockUntilStopped: true });
      const c = new FakeItem('C');
      const capture = createEventCapture();
      let accepted = false;
      const driver: ExecutionDriver = new ExecutionDriver({
        graph: chain('A', 'B', 'C'),
        items: itemMap(a, b, c),
        logger,
        send: async (event) => {
          await capture.send(event);
          if (event.type === 'item_started' && event.name === 'B') {
            accepted = driver.stop();
          }
        },
      });

      const state = await driver.start(['A', 'B', 'C'], { A: true, B: true, C: true });

      expect(accepted).toBe(true);
      expect(state).toBe('user_stopped');
      expect(b.executed).toBe(false);
      expect(b.stopCalls).toBe(1);
      expect(c.executed).toBe(false);
      expect(capture.events.slice(-2)).toEqual([
        { type: 'item_started', name: 'B' },
        { type: 'item_finished', name: 'B', finishState: ItemFinishState.STOPPED },
      ]);
      expect(logger.events('info')).toContain('Item not started: stop requested');
    });

    it('should be a no-op once the run has ended', async () => {
      const a = new FakeItem('A');
      const driver = new ExecutionDriver({ graph: chain('A'), items: itemMap(a), logger });
      await driver.start(['A'], { A: true });

      expect(driver.stop()).toBe(false);
      expect(driver.state).toBe('completed');
    });

    it('should end user_stopped even if the item ignores the request and continues', async () => {
      const a = new FakeItem('A', { blockUntilStopped: true });
      const driver = new ExecutionDriver({ graph: chain('A'), items: itemMap(a), logger });
      const run = driver.start(['A'], { A: true });
      await a.started;
      driver.stop();
      expect(await run).toBe('user_stopped');
    });
  });
});
