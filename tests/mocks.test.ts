import request from 'supertest';
import { buildAnalysis, createAnalysisUpstreamApp } from '../src/mocks/analysisUpstream';
import { createCallbackReceiverApp } from '../src/mocks/callbackReceiver';
import { TEST_SECRET, signedBody } from './helpers';

describe('analysis upstream stand-in', () => {
  const app = createAnalysisUpstreamApp();

  test('should derive the same analysis from the same url', async () => {
    const url = 'https://careers.example.com/openings/senior-engineer?skill=typescript&skill=node&remote=true';

    const response = await request(app)
      .post('/api/analyze')
      .send({ job_id: 'job-1', url })
      .expect(200);

    expect(response.body).toEqual({ job_id: 'job-1', result: buildAnalysis(url) });
    expect(response.body.result).toEqual(expect.objectContaining({
      job_title: 'Senior Engineer',
      company_name: 'careers.example.com',
      preferred_skills: ['typescript', 'node'],
      location_remote_options: 'Remote'
    }));
  });

  test('should simulate upstream failures on reserved paths', async () => {
    await request(app)
      .post('/api/analyze')
      .send({ job_id: 'job-1', url: 'https://careers.example.com/unavailable' })
      .expect(503);
  });

  test('should reject requests without a job id and url', async () => {
    const response = await request(app).post('/api/analyze').send({ url: 'https://careers.example.com/1' }).expect(400);

    expect(response.body).toEqual({ error: 'job_id and url are required' });
  });
});

describe('callback receiver stand-in', () => {
  test('should accept and record a correctly signed callback', async () => {
    const receiver = createCallbackReceiverApp(TEST_SECRET);
    const { body, signature } = signedBody({ job_id: 'job-1', status: 'completed' });

    await request(receiver.app)
      .post('/callback')
      .set('Content-Type', 'application/json')
      .set('X-Webhook-Signature', signature)
      .set('X-Delivery-ID', 'delivery-1')
      .send(body)
      .expect(200);

    expect(receiver.received).toHaveLength(1);
    expect(receiver.received[0]).toEqual(expect.objectContaining({
      deliveryId: 'delivery-1',
      signatureValid: true,
      rawBody: body,
      body: { job_id: 'job-1', status: 'completed' }
    }));
  });

  test('should answer 401 to a bad signature but still record it', async () => {
    const receiver = createCallbackReceiverApp(TEST_SECRET);
    const { body } = signedBody({ job_id: 'job-1' });
    const { signature } = signedBody({ job_id: 'job-1' }, 'other-secret');

    await request(receiver.app)
      .post('/callback')
      .set('Content-Type', 'application/json')
      .set('X-Webhook-Signature', signature)
      .send(body)
      .expect(401);

    expect(receiver.received[0].signatureValid).toBe(false);
  });

  test('should answer with the configured status', async () => {
    const receiver = createCallbackReceiverApp(TEST_SECRET, { status: 500 });
    const { body, signature } = signedBody({ job_id: 'job-1' });

    const send = () => request(receiver.app)
      .post('/callback')
      .set('Content-Type', 'application/json')
      .set('X-Webhook-Signature', signature)
      .send(body);

    await send().expect(500);
    receiver.setStatus(204);
    await send().expect(204);
    expect(receiver.received).toHaveLength(2);
  });
});
