import { describe, it, expect, beforeEach } from 'vitest';
import { Client } from '../../../src/client/client.js';
import { Version } from '../../../src/resources/version.js';
import { Prediction } from '../../../src/resources/prediction.js';
import { FIRST_PAGE, cursorFrom } from '../../../src/pagination/cursor.js';
import { InvalidArgumentError } from '../../../src/errors/argument.js';
import { NotFoundError, RequestError, InvalidResponseError } from '../../../src/errors/request.js';
import { MockTransport } from '../../fixtures/mockTransport.js';
import { predictionRecord, versionRecord } from '../../fixtures/records.js';

describe('Predictions', () => {
  let transport: MockTransport;
  let client: Client;

  beforeEach(() => {
    transport = new MockTransport();
    client = new Client({ transport, pollInterval: 0 });
  });

  describe('list()', () => {
    it('requests the base endpoint for the first page', async () => {
      transport.on('GET', '/v1/predictions', {
        previous: null,
        next: 'https://api.test/v1/predictions?cursor=p2',
        results: [predictionRecord(), predictionRecord({ id: 'pred-2' })],
      });

      const page = await client.predictions.list();

      expect(transport.calls).toEqual([{ method: 'GET', pathOrUrl: '/v1/predictions' }]);
      expect(page.previous).toBeNull();
      expect(page.next).toBe('https://api.test/v1/predictions?cursor=p2');
      expect(page.results.map(p => p.id)).toEqual(['pred-1', 'pred-2']);
      expect(page.results[0]).toBeInstanceOf(Prediction);
    });

    it('requests exactly the target of an explicit cursor', async () => {
      const target = 'https://api.test/v1/predictions?cursor=p2';
      transport.on('GET', target, { previous: '/v1/predictions', next: null, results: [] });

      const page = await client.predictions.list(cursorFrom(target));

      expect(transport.calls).toEqual([{ method: 'GET', pathOrUrl: target }]);
      expect(page.previous).toBe('/v1/predictions');
      expect(page.next).toBeNull();
    });

    it('treats FIRST_PAGE like no cursor', async () => {
      transport.on('GET', '/v1/predictions', { results: [] });

      const page = await client.predictions.list(FIRST_PAGE);

      expect(page).toEqual({ previous: null, next: null, results: [] });
    });

    it('fails fast on a null cursor without touching the network', async () => {
      await expect(async () => client.predictions.list(cursorFrom(null))).rejects.toThrow(InvalidArgumentError);
      await expect(client.predictions.list({ kind: 'cursor', target: '' })).rejects.toThrow(InvalidArgumentError);
      expect(transport.calls).toHaveLength(0);
    });

    it('rejects a literal null passed by an untyped caller', async () => {
      await expect(client.predictions.list(JSON.parse('null'))).rejects.toThrow(
        new InvalidArgumentError('cursor cannot be empty: there is no page to fetch'),
      );
      expect(transport.calls).toHaveLength(0);
    });

    it('wires listed predictions to the client', async () => {
      transport.on('GET', '/v1/predictions', { results: [predictionRecord({ status: 'processing' })] });
      transport.on('GET', '/v1/predictions/pred-1', predictionRecord({ status: 'succeeded' }));

      const page = await client.predictions.list();
      const [prediction] = page.results;
      await prediction?.reload();

      expect(prediction?.status).toBe('succeeded');
    });
  });

  describe('get()', () => {
    it('fetches a prediction by id', async () => {
      transport.on('GET', '/v1/predictions/pred-1', predictionRecord({ status: 'processing' }));

      const prediction = await client.predictions.get('pred-1');

      expect(prediction.status).toBe('processing');
    });

    it('raises NotFoundError for an unknown id', async () => {
      await expect(client.predictions.get('missing')).rejects.toThrow(NotFoundError);
    });

    it('passes other request errors through', async () => {
      transport.on('GET', '/v1/predictions/pred-1', new RequestError('boom', 500, 'internal'));

      await expect(client.predictions.get('pred-1')).rejects.toMatchObject({ status: 500, body: 'internal' });
    });

    it('raises InvalidResponseError for a malformed record', async () => {
      transport.on('GET', '/v1/predictions/pred-1', predictionRecord({ status: 'exploded' }));

      await expect(client.predictions.get('pred-1')).rejects.toThrow(InvalidResponseError);
    });

    it('rejects an empty id before sending anything', async () => {
      await expect(client.predictions.get('')).rejects.toThrow(InvalidArgumentError);
      expect(transport.calls).toHaveLength(0);
    });
  });

  describe('create()', () => {
    beforeEach(() => {
      transport.on('POST', '/v1/predictions', predictionRecord());
    });

    it('sends only version and input when no options are given', async () => {
      await client.predictions.create('ver-1', { prompt: 'a lighthouse at dusk' });

      expect(transport.calls).toEqual([
        {
          method: 'POST',
          pathOrUrl: '/v1/predictions',
          body: { version: 'ver-1', input: { prompt: 'a lighthouse at dusk' } },
        },
      ]);
    });

    it('includes options that are set, in wire format', async () => {
      await client.predictions.create(
        'ver-1',
        { steps: 20 },
        {
          webhook: 'https://hooks.test/p',
          webhookCompleted: 'https://hooks.test/done',
          webhookEventsFilter: ['start', 'completed'],
          stream: false,
        },
      );

      expect(transport.calls[0]?.body).toEqual({
        version: 'ver-1',
        input: { steps: 20 },
        webhook: 'https://hooks.test/p',
        webhook_completed: 'https://hooks.test/done',
        webhook_events_filter: ['start', 'completed'],
        stream: false,
      });
    });

    it('omits options set to undefined instead of sending null', async () => {
      await client.predictions.create('ver-1', {}, { webhook: undefined, stream: true });

      expect(transport.calls[0]?.body).toEqual({ version: 'ver-1', input: {}, stream: true });
    });

    it('accepts a Version object', async () => {
      transport.on('GET', '/v1/models/acme/painter/versions/ver-9', versionRecord({ id: 'ver-9' }));
      const version = await client.models.versions('acme/painter').get('ver-9');
      expect(version).toBeInstanceOf(Version);

      await client.predictions.create(version, { prompt: 'x' });

      expect(transport.callsTo('POST', '/v1/predictions')[0]?.body).toEqual({
        version: 'ver-9',
        input: { prompt: 'x' },
      });
    });

    it('encodes binary input values before sending', async () => {
      await client.predictions.create('ver-1', { image: new Uint8Array([104, 105]) });

      expect(transport.calls[0]?.body).toEqual({
        version: 'ver-1',
        input: { image: 'data:application/octet-stream;base64,aGk=' },
      });
    });

    it('uses a custom file uploader when configured', async () => {
      client = new Client({
        transport,
        fileUploader: async data => `https://files.test/upload-${data.byteLength}`,
      });

      await client.predictions.create('ver-1', { audio: new Uint8Array(3) });

      expect(transport.calls[0]?.body).toEqual({
        version: 'ver-1',
        input: { audio: 'https://files.test/upload-3' },
      });
    });

    it('rejects a missing version or non-object input before sending anything', async () => {
      await expect(client.predictions.create('', {})).rejects.toThrow(InvalidArgumentError);
      await expect(client.predictions.create('ver-1', JSON.parse('[1, 2]'))).rejects.toThrow(
        'input must be an object of named inputs',
      );
      expect(transport.calls).toHaveLength(0);
    });

    it('returns a prediction wired for polling', async () => {
      transport.on('GET', '/v1/predictions/pred-1', predictionRecord({ status: 'succeeded', output: 'done' }));

      const prediction = await client.predictions.create('ver-1', {});
      await prediction.wait();

      expect(prediction.output).toBe('done');
    });
  });

  describe('cancel()', () => {
    it('posts to the cancel endpoint and returns the server state', async () => {
      transport.on('POST', '/v1/predictions/pred-1/cancel', predictionRecord({ status: 'canceled' }));

      const canceled = await client.predictions.cancel('pred-1');

      expect(transport.calls).toEqual([{ method: 'POST', pathOrUrl: '/v1/predictions/pred-1/cancel' }]);
      expect(canceled.status).toBe('canceled');
    });
  });
});
