import sinon from 'sinon';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { V2_BASE, v2Client } from '../__tests__/clients.js';
import { jsonBody, stubFetch } from '../__tests__/fetchStub.js';

beforeEach(() => sinon.restore());
afterEach(() => sinon.restore());

describe('SequencingsApi', () => {
    it('repeats list filters in the query string', async () => {
        const { calls } = stubFetch([{ body: [] }]);

        await v2Client().sequencings.listAll({ projectUuids: ['p1', 'p2'], patientId: 'PAT-1' });

        expect(calls[0]?.url).toBe(`${V2_BASE}/sequencing/full?projectUuids=p1&projectUuids=p2&patientId=PAT-1`);
    });

    it('pages the project sequencing list', async () => {
        const { calls } = stubFetch([{ body: [] }]);

        await v2Client().sequencings.list('p1', { sampleUuids: ['s1'] });

        expect(calls[0]?.url).toBe(`${V2_BASE}/p1/sequencing?sampleUuids=s1&size=10&page=0`);
    });

    it('creates a sequencing with the given fields only', async () => {
        const { calls } = stubFetch([{ body: { uuid: 'q1', sequencingId: 'SEQ-1' } }]);

        const created = await v2Client().sequencings.create('p1', 'q1', {
            sampleUuid: 's1',
            sequencingId: 'SEQ-1',
            type: 'WES',
            germlineControl: 'NO',
        });

        expect(created).toEqual({ uuid: 'q1', sequencingId: 'SEQ-1' });
        expect(calls[0]?.url).toBe(`${V2_BASE}/p1/sequencing/q1`);
        expect(jsonBody(calls[0])).toEqual({ sampleUuid: 's1', sequencingId: 'SEQ-1', type: 'WES', germlineControl: 'NO' });
    });

    it('updates and deletes by uuid', async () => {
        const { calls } = stubFetch([{ body: { uuid: 'q1' } }, { status: 204 }]);
        const api = v2Client().sequencings;

        await api.update('p1', 'q1', { comments: 'rerun' });
        await api.delete('p1', 'q1');

        expect(calls.map(c => `${c.method} ${c.url}`)).toEqual([
            `PUT ${V2_BASE}/p1/sequencing/q1`,
            `DELETE ${V2_BASE}/p1/sequencing/q1`,
        ]);
    });
});
