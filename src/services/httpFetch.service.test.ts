import { HttpFetchService } from './httpFetch.service';
import { SourceFetchError } from '../types/source.types';
import { createStubHttpClient, createTestConfig, createTestLogging } from '../testing/testServices';

const URL = 'https://feeds.example.test/conferences.yml';

function createService(handler: Parameters<typeof createStubHttpClient>[0], env: Record<string, string> = {}) {
    const config = createTestConfig(env);
    const { client, requests } = createStubHttpClient(handler);
    return { service: new HttpFetchService(client, config, createTestLogging(config)), requests };
}

describe('HttpFetchService', () => {
    it('returns the body of a 200 response', async () => {
        const { service, requests } = createService(() => ({ status: 200, data: '- name: CCS\n' }));

        await expect(service.fetchText(URL)).resolves.toBe('- name: CCS\n');
        expect(requests).toHaveLength(1);
        expect(requests[0].url).toBe(URL);
        expect(requests[0].timeout).toBe(15000);
        expect(requests[0].responseType).toBe('text');
    });

    it('uses the configured timeout', async () => {
        const { service, requests } = createService(() => ({ status: 200, data: '' }), { SOURCE_FETCH_TIMEOUT_MS: '2500' });
        await service.fetchText(URL);
        expect(requests[0].timeout).toBe(2500);
    });

    it('serializes bodies that are not text', async () => {
        const { service } = createService(() => ({ status: 200, data: [{ name: 'CCS' }] }));
        await expect(service.fetchText(URL)).resolves.toBe('[{"name":"CCS"}]');
    });

    it('fails on any status other than 200', async () => {
        const { service } = createService(() => ({ status: 404, data: 'Not Found' }));
        const failure = service.fetchText(URL);

        await expect(failure).rejects.toBeInstanceOf(SourceFetchError);
        await expect(failure).rejects.toMatchObject({ details: { url: URL, status: 404 } });
    });

    it('wraps transport errors', async () => {
        const { service } = createService(() => {
            throw new Error('socket hang up');
        });
        await expect(service.fetchText(URL)).rejects.toThrow(`Request to ${URL} failed: socket hang up`);
    });
});
