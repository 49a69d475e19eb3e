import * as fs from 'fs/promises';
import chai, { expect } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import mock from 'mock-fs';
import sinon from 'sinon';
import { BackendError } from '../Errors';
import { ensureWeights, weightsUrl, type WeightsSource } from './LocalWeights';

chai.use(chaiAsPromised);

const SOURCE: WeightsSource = { repo: 'test-org/tiny-model-GGUF', file: 'tiny.Q4.gguf' };

describe('LocalWeights', () => {
  afterEach(() => {
    mock.restore();
  });

  it('builds the hub download URL', () => {
    expect(weightsUrl(SOURCE)).to.equal('https://huggingface.co/test-org/tiny-model-GGUF/resolve/main/tiny.Q4.gguf');
  });

  it('returns the cached file without downloading', async () => {
    mock({ '/cache': { 'tiny.Q4.gguf': 'cached-weights' } });
    const fetcher = sinon.stub<[string], Promise<Response>>();

    const location = await ensureWeights('/cache', SOURCE, fetcher);

    expect(location).to.equal('/cache/tiny.Q4.gguf');
    expect(fetcher.called).to.equal(false);
  });

  it('downloads missing weights into the cache directory', async () => {
    mock({ '/home': {} });
    const fetcher = sinon.stub<[string], Promise<Response>>().resolves(new Response('downloaded-weights'));

    const location = await ensureWeights('/home/models', SOURCE, fetcher);

    expect(location).to.equal('/home/models/tiny.Q4.gguf');
    expect(fetcher.calledOnceWith(weightsUrl(SOURCE))).to.equal(true);
    expect(await fs.readFile(location, 'utf8')).to.equal('downloaded-weights');
    expect(await fs.readdir('/home/models')).to.deep.equal(['tiny.Q4.gguf']);
  });

  it('fails without leaving a file behind when the hub answers with an error', async () => {
    mock({ '/cache': {} });
    const fetcher = sinon.stub<[string], Promise<Response>>().resolves(new Response('not found', { status: 404 }));

    await expect(ensureWeights('/cache', SOURCE, fetcher)).to.be.rejectedWith(BackendError, 'HTTP 404');
    expect(await fs.readdir('/cache')).to.deep.equal([]);
  });

  it('removes the partial file when the transfer breaks off', async () => {
    mock({ '/cache': {} });
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('GGUF'));
        controller.error(new Error('connection reset'));
      },
    });
    const fetcher = sinon.stub<[string], Promise<Response>>().resolves(new Response(body));

    await expect(ensureWeights('/cache', SOURCE, fetcher)).to.be.rejectedWith(BackendError, 'connection reset');
    expect(await fs.readdir('/cache')).to.deep.equal([]);
  });

  it('reports network failures as backend errors', async () => {
    mock({ '/cache': {} });
    const fetcher = sinon.stub<[string], Promise<Response>>().rejects(new Error('getaddrinfo ENOTFOUND'));

    await expect(ensureWeights('/cache', SOURCE, fetcher)).to.be.rejectedWith(BackendError, 'getaddrinfo ENOTFOUND');
  });
});
