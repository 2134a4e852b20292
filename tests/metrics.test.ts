import { test } from 'node:test';
import assert from 'node:assert/strict';
import { METRIC, TelemetrySink } from '../src/observability/metrics.js';

test('Telemetry sink', async (t) => {
  await t.test('counts and observes declared metrics', async () => {
    const sink = new TelemetrySink({ strict: true });
    sink.increment(METRIC.requests);
    sink.increment(METRIC.requests);
    sink.observe(METRIC.requestDuration, 0.004);
    sink.set(METRIC.ledgerPending, 7);

    assert.equal(await sink.counterValue(METRIC.requests), 2);
    assert.equal(await sink.histogramCount(METRIC.requestDuration), 1);
    assert.equal(await sink.gaugeValue(METRIC.ledgerPending), 7);
  });

  await t.test('renders the Prometheus text exposition', async () => {
    const sink = new TelemetrySink({ strict: true });
    sink.increment(METRIC.rejections);
    sink.observe(METRIC.requestDuration, 0.004);

    const rendered = await sink.render();
    assert.match(rendered.contentType, /^text\/plain/);
    const lines = rendered.body.split('\n');
    assert.ok(lines.includes('# TYPE inference_rejections_total counter'));
    assert.ok(lines.includes('inference_rejections_total 1'));
    assert.ok(lines.includes('inference_request_duration_seconds_bucket{le="0.005"} 1'));
    assert.ok(lines.includes('inference_request_duration_seconds_bucket{le="0.0025"} 0'));
    assert.ok(lines.includes('inference_request_duration_seconds_count 1'));
  });

  await t.test('renders JSON on request', async () => {
    const sink = new TelemetrySink({ strict: true });
    sink.increment(METRIC.driftSignals);
    const rendered = await sink.render('json');
    assert.equal(rendered.contentType, 'application/json; charset=utf-8');
    const parsed: unknown = JSON.parse(rendered.body);
    assert.ok(Array.isArray(parsed));
    const signals = parsed.find((metric: { name?: string }) => metric.name === METRIC.driftSignals);
    assert.equal(signals.values[0].value, 1);
  });

  await t.test('separate sinks do not share state', async () => {
    const first = new TelemetrySink({ strict: true });
    const second = new TelemetrySink({ strict: true });
    first.increment(METRIC.requests);
    assert.equal(await first.counterValue(METRIC.requests), 1);
    assert.equal(await second.counterValue(METRIC.requests), 0);
  });

  await t.test('undeclared names throw in strict mode', () => {
    const sink = new TelemetrySink({ strict: true });
    assert.throws(() => sink.increment('not_a_metric_total'), /Undeclared counter metric "not_a_metric_total"/);
    assert.throws(() => sink.observe('not_a_histogram', 1), /Undeclared histogram/);
  });

  await t.test('undeclared names are ignored outside strict mode', async () => {
    const sink = new TelemetrySink({ strict: false });
    assert.doesNotThrow(() => sink.increment('not_a_metric_total'));
    assert.doesNotThrow(() => sink.set('not_a_gauge', 3));
    assert.equal(await sink.counterValue(METRIC.requests), 0);
  });

  await t.test('a timer records exactly once', async () => {
    const sink = new TelemetrySink({ strict: true });
    const end = sink.startTimer(METRIC.requestDuration);
    end();
    end();
    assert.equal(await sink.histogramCount(METRIC.requestDuration), 1);
  });
});
