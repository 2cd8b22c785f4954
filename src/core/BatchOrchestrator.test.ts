import { describe, expect, it, vi } from 'vitest';
import { BatchOrchestrator, buildRow, type RecordCaller } from './BatchOrchestrator.js';
import { BatchCancelledError, CallFailedError } from './errors.js';
import type { AdRecord, ProgressSink, RateLimitState, RecordEvent } from './types.js';
import { flatten } from './ResponseNormalizer.js';

const roomyQuota: RateLimitState = { max_requests: 100, interval_seconds: 10 };

function ad(title: string): AdRecord {
  return { title, snippet: `${title} snippet`, displayed_link: `${title.toLowerCase()}.com` };
}

function recordingSink(): ProgressSink & { events: RecordEvent[]; progress: Array<[number, number]> } {
  const events: RecordEvent[] = [];
  const progress: Array<[number, number]> = [];
  return {
    events,
    progress,
    onRecord: (event) => events.push(event),
    onProgress: (processed, total) => progress.push([processed, total]),
  };
}

/** Caller answering by record title; an Error answer is thrown */
function callerByTitle(answers: Record<string, string | Error>): RecordCaller & { log: string[] } {
  const log: string[] = [];
  return {
    log,
    async call(record) {
      log.push(`call:${record.title}`);
      const answer = answers[record.title];
      if (answer instanceof Error) throw answer;
      return answer;
    },
  };
}

describe('buildRow', () => {
  it('puts record fields first and renames colliding analysis keys', () => {
    const row = buildRow(
      { title: 'A', snippet: 'B', displayed_link: 'c.com', extensions: 'Sitelinks' },
      { kind: 'success', fields: { title: 'Strong', analysis_status: 'x', score: '9' } }
    );
    expect(row).toEqual({
      title: 'A',
      snippet: 'B',
      displayed_link: 'c.com',
      extensions: 'Sitelinks',
      analysis_title: 'Strong',
      analysis_analysis_status: 'x',
      score: '9',
    });
    expect(Object.keys(row).slice(0, 4)).toEqual(['title', 'snippet', 'displayed_link', 'extensions']);
  });

  it('keeps an analysis key that already carries the prefix', () => {
    const row = buildRow(ad('A'), {
      kind: 'success',
      fields: { analysis_title: 'model-own', title: 'model-title' },
    });
    expect(row).toEqual({
      title: 'A',
      snippet: 'A snippet',
      displayed_link: 'a.com',
      analysis_title: 'model-own',
      analysis_analysis_title: 'model-title',
    });
  });

  it('keeps a __proto__ analysis key as a column', () => {
    const row = buildRow(ad('A'), { kind: 'success', fields: flatten(JSON.parse('{"__proto__": 1}')) });
    expect(Object.hasOwn(row, '__proto__')).toBe(true);
    expect(Object.keys(row)).toEqual(['title', 'snippet', 'displayed_link', '__proto__']);
  });

  it('marks failed rows', () => {
    expect(buildRow(ad('A'), { kind: 'failed', reason: 'HTTP 500' })).toEqual({
      title: 'A',
      snippet: 'A snippet',
      displayed_link: 'a.com',
      analysis_status: 'failed',
      analysis_error: 'HTTP 500',
    });
  });
});

describe('BatchOrchestrator', () => {
  it('produces the analysis row for a successful record', async () => {
    const caller = callerByTitle({ A: '{"title_score": 8}' });
    const orchestrator = new BatchOrchestrator(caller, { sleep: vi.fn(async () => {}) });

    const result = await orchestrator.run(
      [{ title: 'A', snippet: 'B', displayed_link: 'c.com' }],
      'kits',
      roomyQuota,
      recordingSink()
    );

    expect(result.rows).toEqual([{ title: 'A', snippet: 'B', displayed_link: 'c.com', title_score: '8' }]);
    expect(result.counters).toEqual({ attempted: 1, succeeded: 1, degraded: 0, failed: 0 });
  });

  it('keeps non-JSON text as a degraded row', async () => {
    const caller = callerByTitle({ A: 'not json' });
    const orchestrator = new BatchOrchestrator(caller);

    const result = await orchestrator.run([ad('A')], '', roomyQuota, recordingSink());

    expect(result.rows[0]).toMatchObject({
      analysis_status: 'degraded',
      raw_response: 'not json',
    });
    expect(result.outcomes[0]).toEqual({
      kind: 'degraded',
      rawText: 'not json',
      reason: 'parse failure: no JSON object found in response',
    });
    expect(result.counters).toEqual({ attempted: 1, succeeded: 0, degraded: 1, failed: 0 });
  });

  it('unifies keys across rows with the placeholder', async () => {
    const caller = callerByTitle({ A: '{"x": 1}', B: '{"y": 2}' });
    const orchestrator = new BatchOrchestrator(caller);

    const result = await orchestrator.run([ad('A'), ad('B')], '', roomyQuota, recordingSink());

    expect(result.rows).toEqual([
      { title: 'A', snippet: 'A snippet', displayed_link: 'a.com', x: '1', y: '' },
      { title: 'B', snippet: 'B snippet', displayed_link: 'b.com', x: '', y: '2' },
    ]);
  });

  it('records a failed call and carries on with the batch', async () => {
    const caller = callerByTitle({
      A: new CallFailedError('HTTP 503', 3),
      B: '{"ok": true}',
    });
    const sink = recordingSink();
    const orchestrator = new BatchOrchestrator(caller);

    const result = await orchestrator.run([ad('A'), ad('B')], '', roomyQuota, sink);

    expect(result.rows.map((row) => row.analysis_status)).toEqual(['failed', '']);
    expect(result.rows[0].analysis_error).toBe('HTTP 503');
    expect(result.rows[1].ok).toBe('true');
    expect(result.counters).toEqual({ attempted: 2, succeeded: 1, degraded: 0, failed: 1 });
    expect(sink.events).toEqual([
      { type: 'started', index: 0 },
      { type: 'failed', index: 0, reason: 'HTTP 503' },
      { type: 'started', index: 1 },
      { type: 'succeeded', index: 1 },
    ]);
    expect(sink.progress).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it('returns a result even when every record fails', async () => {
    const caller = callerByTitle({ A: new CallFailedError('down', 3), B: new Error('unexpected') });
    const orchestrator = new BatchOrchestrator(caller);

    const result = await orchestrator.run([ad('A'), ad('B')], '', roomyQuota, recordingSink());

    expect(result.counters).toEqual({ attempted: 2, succeeded: 0, degraded: 0, failed: 2 });
    expect(result.outcomes).toEqual([
      { kind: 'failed', reason: 'down' },
      { kind: 'failed', reason: 'unexpected' },
    ]);
  });

  it('produces one row per record in input order', async () => {
    const titles = ['A', 'B', 'C', 'D', 'E'];
    const answers = Object.fromEntries(titles.map((t) => [t, `{"label": "${t}"}`]));
    const orchestrator = new BatchOrchestrator(callerByTitle(answers), { sleep: vi.fn(async () => {}) });

    const result = await orchestrator.run(titles.map(ad), '', { max_requests: 2, interval_seconds: 1 }, recordingSink());

    expect(result.rows.map((row) => row.title)).toEqual(titles);
    expect(result.rows.map((row) => row.label)).toEqual(titles);
  });

  it('pauses once before record 3 when max_requests is 2', async () => {
    const log: string[] = [];
    const caller: RecordCaller = {
      async call(record) {
        log.push(`call:${record.title}`);
        return '{}';
      },
    };
    const sleep = vi.fn(async (ms: number) => {
      log.push(`sleep:${ms}`);
    });
    const orchestrator = new BatchOrchestrator(caller, { sleep });

    await orchestrator.run([ad('A'), ad('B'), ad('C')], '', { max_requests: 2, interval_seconds: 1.5 }, recordingSink());

    expect(log).toEqual(['call:A', 'call:B', 'sleep:1500', 'call:C']);
  });

  it('does not pause when the batch fits in one quota window', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const orchestrator = new BatchOrchestrator(callerByTitle({ A: '{}', B: '{}' }), { sleep });

    await orchestrator.run([ad('A'), ad('B')], '', { max_requests: 2, interval_seconds: 1 }, recordingSink());

    expect(sleep).not.toHaveBeenCalled();
  });

  it('keeps input order when calls complete out of order', async () => {
    const delays: Record<string, number> = { A: 30, B: 5, C: 15, D: 1 };
    const caller: RecordCaller = {
      call: (record) =>
        new Promise((resolve) => setTimeout(() => resolve(`{"n": "${record.title}"}`), delays[record.title])),
    };
    const sleep = vi.fn(async (_ms: number) => {});
    const orchestrator = new BatchOrchestrator(caller, { concurrency: 4, sleep });

    const result = await orchestrator.run(
      ['A', 'B', 'C', 'D'].map(ad),
      '',
      { max_requests: 2, interval_seconds: 1 },
      recordingSink()
    );

    expect(result.rows.map((row) => row.n)).toEqual(['A', 'B', 'C', 'D']);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('passes the context label to the caller', async () => {
    const call = vi.fn(async (_record: AdRecord, _context: string) => '{}');
    const orchestrator = new BatchOrchestrator({ call });

    await orchestrator.run([ad('A')], 'ELISA kits', roomyQuota, recordingSink());

    expect(call).toHaveBeenCalledWith(ad('A'), 'ELISA kits');
  });

  it('keeps going when the sink throws', async () => {
    const sink: ProgressSink = {
      onRecord: () => {
        throw new Error('render failed');
      },
      onProgress: () => {},
    };
    const orchestrator = new BatchOrchestrator(callerByTitle({ A: '{"a": 1}' }));

    const result = await orchestrator.run([ad('A')], '', roomyQuota, sink);
    expect(result.counters.succeeded).toBe(1);
  });

  it('stops between records once the signal is aborted', async () => {
    const controller = new AbortController();
    const caller: RecordCaller = {
      async call(record) {
        if (record.title === 'A') controller.abort();
        return '{}';
      },
    };
    const orchestrator = new BatchOrchestrator(caller, { signal: controller.signal });

    const error = await orchestrator
      .run([ad('A'), ad('B'), ad('C')], '', roomyQuota, recordingSink())
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BatchCancelledError);
    expect(error).toMatchObject({ processed: 1, total: 3 });
  });

  it('returns an empty result for no records', async () => {
    const result = await new BatchOrchestrator(callerByTitle({})).run([], '', roomyQuota, recordingSink());
    expect(result).toEqual({ rows: [], outcomes: [], counters: { attempted: 0, succeeded: 0, degraded: 0, failed: 0 } });
  });

  it('rejects an invalid quota or concurrency', async () => {
    expect(() => new BatchOrchestrator(callerByTitle({}), { concurrency: 0 })).toThrow(
      'concurrency must be an integer >= 1, got 0'
    );
    await expect(
      new BatchOrchestrator(callerByTitle({})).run([], '', { max_requests: 0, interval_seconds: 1 }, recordingSink())
    ).rejects.toThrow('Invalid rate limit');
  });
});
