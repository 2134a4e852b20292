import { test } from 'node:test';
import assert from 'node:assert/strict';
import { getTraceContext, parseTraceparent, runInSpan } from '../src/observability/telemetry.js';

test('Trace context', async (t) => {
  await t.test('parses a valid traceparent', () => {
    assert.deepEqual(parseTraceparent('00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01'), {
      traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
      parentSpanId: '00f067aa0ba902b7'
    });
  });

  await t.test('rejects malformed and all-zero headers', () => {
    assert.equal(parseTraceparent(undefined), undefined);
    assert.equal(parseTraceparent('00-abc-00f067aa0ba902b7-01'), undefined);
    assert.equal(parseTraceparent('00-4bf92f3577b34da6a3ce929d0e0e4736'), undefined);
    assert.equal(parseTraceparent('00-4bf92f3577b34da6a3ce929d0e0e473z-00f067aa0ba902b7-01'), undefined);
    assert.equal(parseTraceparent(`00-${'0'.repeat(32)}-00f067aa0ba902b7-01`), undefined);
    assert.equal(parseTraceparent(`00-4bf92f3577b34da6a3ce929d0e0e4736-${'0'.repeat(16)}-01`), undefined);
    assert.equal(parseTraceparent('ff-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01'), undefined);
  });

  await t.test('nested spans keep the trace and link the parent', async () => {
    await runInSpan(async () => {
      const outer = getTraceContext();
      await runInSpan(async () => {
        const inner = getTraceContext();
        assert.equal(inner?.traceId, outer?.traceId);
        assert.equal(inner?.parentSpanId, outer?.spanId);
      });
    });
  });
});
