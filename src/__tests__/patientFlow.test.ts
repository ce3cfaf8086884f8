import sinon from 'sinon';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ApiError } from '../errors.js';
import { V2_BASE, v2Client } from './clients.js';
import { stubFetch } from './fetchStub.js';

beforeEach(() => sinon.restore());
afterEach(() => sinon.restore());

describe('v2 patient round trip', () => {
    it('returns the created patient exactly as the server sent it', async () => {
        const reply = {
            uuid: 'pt-1',
            patientId: 'PAT-1',
            gender: 'FEMALE',
            createdAt: '2024-03-01T10:00:00Z',
            treatments: [],
        };
        stubFetch([{ status: 201, body: reply }]);

        const created = await v2Client().patients.create('proj', 'pt-1', { patientId: 'PAT-1', gender: 'FEMALE' });

        expect(created).toEqual(reply);
    });

    it('raises with the literal response text when the patient is missing', async () => {
        const { calls } = stubFetch([{ status: 404, body: 'No patient with uuid pt-9' }]);

        const error = await v2Client()
            .patients.get('proj', 'pt-9')
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({
            status: 404,
            body: 'No patient with uuid pt-9',
            message: 'Failed to get patient: 404 - No patient with uuid pt-9',
        });
        expect(calls[0]?.url).toBe(`${V2_BASE}/proj/patient/pt-9`);
    });
});
