import { describe, expect, it } from 'vitest';

import { AmcsStatus } from '../amcsStatus';
import { createAck, dispatchCommand } from '../commandDispatcher';

const createStatus = (): AmcsStatus => new AmcsStatus({ startTai: 0 });

describe('dispatchCommand', () => {
    it('acknowledges with the command id and name', () => {
        expect(createAck({ commandId: '9', body: { command: 'stopAz' } })).toEqual({
            commandId: '9',
            command: 'stopAz',
            status: 'ack',
        });
    });

    it('returns the move duration', () => {
        const response = dispatchCommand(
            createStatus(),
            { commandId: '1', body: { command: 'moveAz', position: 15, velocity: 0 } },
            0,
        );
        expect(response.status).toBe('done');
        expect(response.result?.['duration']).toBeCloseTo(10, 10);
    });

    it('returns the park end time', () => {
        const amcs = createStatus();
        amcs.moveAz(0, 3, 0);
        const response = dispatchCommand(amcs, { commandId: '2', body: { command: 'park' } }, 2);
        expect(response.result?.['endTai']).toBeCloseTo(4, 10);
    });

    it('returns the applied limits for config', () => {
        const response = dispatchCommand(
            createStatus(),
            { commandId: '3', body: { command: 'config', limits: { jmax: 2 } } },
            0,
        );
        expect(response).toEqual({
            commandId: '3',
            command: 'config',
            status: 'done',
            result: { jmax: 2, amax: 0.75, vmax: 1.5 },
        });
    });

    it('returns an empty result for switch commands', () => {
        const amcs = createStatus();
        const response = dispatchCommand(amcs, { commandId: '4', body: { command: 'inflate', action: 'ON' } }, 1);
        expect(response).toEqual({ commandId: '4', command: 'inflate', status: 'done', result: {} });
        expect(amcs.determineStatus(1).status.inflate).toBe('ON');
    });

    it('turns rejections into an error response', () => {
        const response = dispatchCommand(
            createStatus(),
            { commandId: '5', body: { command: 'crawlAz', velocity: 5 } },
            0,
        );
        expect(response.status).toBe('error');
        expect(response.result).toBeUndefined();
        expect(response.errors).toHaveLength(1);
        expect(response.errors?.[0]?.code).toBe('invalid-command');
        expect(response.errors?.[0]?.reason).toBe('InvalidCommandError');
    });

    it('reports time travel', () => {
        const amcs = new AmcsStatus({ startTai: 10 });
        const response = dispatchCommand(amcs, { commandId: '6', body: { command: 'stopAz' } }, 5);
        expect(response.errors).toEqual([
            {
                code: 'time-travel',
                reason: 'TimeTravelError',
                message: 'Encountered TAI 5 which is smaller than start TAI 10',
            },
        ]);
    });
});
