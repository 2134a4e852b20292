import { test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import request from 'supertest';
import { createApp } from '../src/app.js';
import { TelemetrySink } from '../src/observability/metrics.js';
import { JsonlLedgerRepository } from '../src/repositories/ledgerRepository.js';
import { OutcomeLedger } from '../src/services/outcomeLedger.js';
import { ScoringArtifactAdapter, fileSource } from '../src/services/scoringArtifact.js';
import { expectedProbability } from './helpers.js';

const MODEL_PATH = fileURLToPath(new URL('../models/churn-model.json', import.meta.url));

async function bootstrap() {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'churn-integration-'));
  const ledgerPath = path.join(dir, 'ledger.jsonl');
  const metrics = new TelemetrySink({ strict: true });
  const adapter = new ScoringArtifactAdapter(fileSource(MODEL_PATH), metrics);
  await adapter.load();
  const ledger = await OutcomeLedger.open(new JsonlLedgerRepository(ledgerPath));
  const app = createApp({ adapter, ledger, metrics });
  return { dir, ledgerPath, metrics, adapter, ledger, app };
}

const customer = { tenure: 24, usage: 40, age: 45, monthly_charges: 65 };

test('churn scoring service', async (t) => {
  await t.test('longer contracts lower the churn probability', async () => {
    const { app, dir } = await bootstrap();
    try {
      const probabilities: number[] = [];
      for (const [contract, indicators] of [
        ['Month-to-month', [0, 0]],
        ['One year', [1, 0]],
        ['Two year', [0, 1]]
      ] as const) {
        const res = await request(app).post('/predict').send({ ...customer, contract_type: contract });
        assert.equal(res.status, 200);
        assert.equal(res.headers['x-model-version'], 'churn-logreg-2024.06.1');
        assert.equal(res.body.probability, expectedProbability([24, 40, 45, 65, ...indicators]));
        assert.equal(res.body.label, 0);
        probabilities.push(res.body.probability);
      }
      assert.ok(probabilities[0] > probabilities[1]);
      assert.ok(probabilities[1] > probabilities[2]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  await t.test('predictions and outcomes survive a restart of the ledger', async () => {
    const { app, dir, ledgerPath } = await bootstrap();
    try {
      const predicted = await request(app)
        .post('/predict')
        .set('x-request-id', 'cust-42')
        .send({ ...customer, contract_type: 'Month-to-month' });
      assert.equal(predicted.status, 200);

      const outcome = await request(app)
        .post('/outcomes')
        .send({ request_id: 'cust-42', label: 1, observed_at: '2024-07-01T00:00:00.000Z' });
      assert.equal(outcome.status, 202);

      const reopened = await OutcomeLedger.open(new JsonlLedgerRepository(ledgerPath));
      assert.deepEqual(reopened.stats(), { predictions: 1, outcomes: 1, pending: 0 });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  await t.test('hot reload swaps versions and keeps serving after a bad reload', async () => {
    const { app, adapter, dir } = await bootstrap();
    try {
      const nextPath = path.join(dir, 'churn-model-next.json');
      const current = await fs.readFile(MODEL_PATH, 'utf8');
      await fs.writeFile(nextPath, current.replace('churn-logreg-2024.06.1', 'churn-logreg-2024.07.1'));

      const swapped = await adapter.reload(fileSource(nextPath));
      assert.deepEqual(swapped, { ok: true, version: 'churn-logreg-2024.07.1', previousVersion: 'churn-logreg-2024.06.1' });

      const afterSwap = await request(app).post('/predict').send({ ...customer, contract_type: 'One year' });
      assert.equal(afterSwap.headers['x-model-version'], 'churn-logreg-2024.07.1');

      await fs.writeFile(nextPath, '{"format_version": 1, "version": "broken"');
      const failed = await request(app).post('/model/reload');
      assert.equal(failed.status, 503);
      assert.equal(failed.body.error.details.reason, 'corrupt');

      const stillServing = await request(app).post('/predict').send({ ...customer, contract_type: 'One year' });
      assert.equal(stillServing.status, 200);
      assert.equal(stillServing.headers['x-model-version'], 'churn-logreg-2024.07.1');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
