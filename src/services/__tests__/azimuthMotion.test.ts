import { describe, expect, it } from 'vitest';

import type { EngineState } from '../../types';
import { TWO_PI } from '../../utils/angle';
import {
    InvalidCommandError,
    TimeTravelError,
    UnreachablePhaseError,
} from '../../utils/commandErrors';
import { AzimuthMotion, evaluateMotion } from '../azimuthMotion';

const createMotion = (startPosition = 0, maxSpeed = 1.0, startTai = 0): AzimuthMotion =>
    new AzimuthMotion({ startPosition, maxSpeed, startTai });

describe('AzimuthMotion move and crawl', () => {
    it('moves at max speed to the target and crawls afterwards', () => {
        const motion = createMotion();

        const duration = motion.setTarget(0, Math.PI, 0.1, 'MOVING');
        expect(duration).toBe(Math.PI);

        const halfway = motion.evaluate(Math.PI / 2);
        expect(halfway.phase).toBe('MOVING');
        expect(halfway.velocity).toBe(1.0);
        expect(halfway.position).toBeCloseTo(Math.PI / 2, 12);

        const arrived = motion.evaluate(Math.PI);
        expect(arrived.phase).toBe('CRAWLING');
        expect(arrived.velocity).toBe(0.1);
        expect(arrived.position).toBeCloseTo(Math.PI, 12);

        const later = motion.evaluate(Math.PI + 10);
        expect(later.phase).toBe('CRAWLING');
        expect(later.position).toBeCloseTo(Math.PI + 1.0, 10);
    });

    it('reports negative velocity when moving towards a smaller angle', () => {
        const motion = createMotion(3.0, 0.5);
        expect(motion.setTarget(0, 1.0, 0, 'MOVING')).toBeCloseTo(4, 12);

        const sample = motion.evaluate(2);
        expect(sample.phase).toBe('MOVING');
        expect(sample.velocity).toBe(-0.5);
        expect(sample.position).toBeCloseTo(2.0, 12);

        expect(motion.evaluate(4)).toEqual({ position: 1.0, velocity: 0, phase: 'STOPPED' });
    });

    it('advances exactly by the crawl velocity once the move is done', () => {
        const motion = createMotion();
        motion.setTarget(0, Math.PI, 0.1, 'MOVING');

        const first = motion.evaluate(Math.PI + 2);
        const second = motion.evaluate(Math.PI + 7);
        expect(second.position - first.position).toBeCloseTo(0.1 * (Math.PI + 7 - (Math.PI + 2)), 12);
    });

    it('crawls right away and wraps below zero to just under 2π', () => {
        const motion = createMotion();
        expect(motion.setTarget(0, Number.NaN, -0.2, 'CRAWLING')).toBe(0);

        expect(motion.evaluate(0)).toEqual({ position: 0, velocity: -0.2, phase: 'CRAWLING' });

        const positions = [1, 2, 3].map((tai) => motion.evaluate(tai).position);
        expect(positions[0]).toBeCloseTo(TWO_PI - 0.2, 12);
        expect(positions[1]).toBeCloseTo(TWO_PI - 0.4, 12);
        expect(positions[2]).toBeCloseTo(TWO_PI - 0.6, 12);
        expect(positions[0]).toBeLessThan(TWO_PI);
        expect(positions[1]).toBeLessThan(positions[0]);
        expect(positions[2]).toBeLessThan(positions[1]);
    });

    it('degenerates to STOPPED when the crawl velocity is zero', () => {
        const motion = createMotion(1.0);
        motion.setTarget(0, Number.NaN, 0, 'CRAWLING');

        expect(motion.evaluate(5)).toEqual({ position: 1.0, velocity: 0, phase: 'STOPPED' });
    });

    it('enters the post-transit branch at once for a zero-length move', () => {
        const motion = createMotion(1.0);

        expect(motion.setTarget(0, 1.0, 0.05, 'MOVING')).toBe(0);
        expect(motion.evaluate(0)).toEqual({ position: 1.0, velocity: 0.05, phase: 'CRAWLING' });
    });

    it('re-plans from the current position when a new target arrives mid-move', () => {
        const motion = createMotion(0, 0.5);
        motion.setTarget(0, 2.0, 0, 'MOVING');

        const duration = motion.setTarget(2, 0.5, 0, 'MOVING');
        expect(duration).toBeCloseTo(1, 12);
        expect(motion.getState().startPosition).toBeCloseTo(1.0, 12);
        expect(motion.evaluate(2.5).velocity).toBe(-0.5);
    });
});

describe('AzimuthMotion continuity and purity', () => {
    it('returns the pre-command position at the issue time', () => {
        const motion = createMotion(1.0);
        motion.setTarget(0, Number.NaN, 0.05, 'CRAWLING');

        const before = motion.evaluate(4).position;
        motion.setTarget(4, 3.0, 0.01, 'MOVING');
        expect(motion.evaluate(4).position).toBe(before);

        const beforePark = motion.evaluate(6).position;
        motion.park(6);
        expect(motion.evaluate(6).position).toBe(beforePark);

        const beforeCrawl = motion.evaluate(7).position;
        motion.setTarget(7, Number.NaN, -0.3, 'CRAWLING');
        expect(motion.evaluate(7).position).toBe(beforeCrawl);
    });

    it('gives identical results for repeated queries', () => {
        const motion = createMotion();
        motion.setTarget(0, 2.5, 0.3, 'MOVING');
        const state = motion.getState();

        for (const tai of [0.7, 2.5, 11.3]) {
            expect(motion.evaluate(tai)).toStrictEqual(motion.evaluate(tai));
        }
        expect(motion.getState()).toBe(state);
    });

    it('answers queries out of order for any time after the command', () => {
        const motion = createMotion();
        motion.setTarget(0, 2.0, 0.1, 'MOVING');

        const late = motion.evaluate(10);
        const early = motion.evaluate(1);
        expect(motion.evaluate(10)).toStrictEqual(late);
        expect(early.phase).toBe('MOVING');
    });

    it('rejects queries before the command was issued', () => {
        const motion = createMotion(0, 1.0, 10);
        expect(() => motion.evaluate(9.5)).toThrow(TimeTravelError);
    });

    it('rejects queries at a non-finite time', () => {
        const motion = createMotion();
        motion.setTarget(0, Number.NaN, 0.1, 'CRAWLING');

        expect(() => motion.evaluate(Number.NaN)).toThrow(InvalidCommandError);
        expect(() => motion.evaluate(Number.POSITIVE_INFINITY)).toThrow(
            'tai must be a finite number, got Infinity',
        );
        expect(() => evaluateMotion(motion.getState(), Number.NaN)).toThrow(
            'tai must be a finite number, got NaN',
        );
    });
});

describe('AzimuthMotion stop', () => {
    it('stops at once and stays frozen', () => {
        const motion = createMotion();
        motion.setTarget(0, Number.NaN, 0.2, 'CRAWLING');

        motion.stop(3);
        const stopped = motion.evaluate(3);
        expect(stopped.phase).toBe('STOPPED');
        expect(stopped.velocity).toBe(0);
        expect(stopped.position).toBeCloseTo(0.6, 12);

        for (const tai of [4, 100, 1e6]) {
            expect(motion.evaluate(tai)).toEqual(stopped);
        }
    });

    it('re-freezes at the same position when stopped again', () => {
        const motion = createMotion();
        motion.setTarget(0, 2.0, 0, 'MOVING');
        motion.stop(1);
        const first = motion.evaluate(1);

        motion.stop(5);
        expect(motion.evaluate(5)).toEqual(first);
        expect(motion.getState().commandedPhase).toBe('STOPPING');
        expect(motion.getState().endTime).toBe(5);
    });
});

describe('AzimuthMotion park', () => {
    it('plans the park from the position reached mid-move', () => {
        const motion = createMotion(1.0, 0.5);
        motion.setTarget(0, 4.0, 0, 'MOVING');

        const endTai = motion.park(5);
        expect(motion.getState().startPosition).toBeCloseTo(3.5, 12);
        expect(endTai).toBeCloseTo(12, 10);

        const parking = motion.evaluate(8);
        expect(parking.phase).toBe('PARKING');
        expect(parking.velocity).toBe(-0.5);
        expect(parking.position).toBeCloseTo(2.0, 10);

        const parked = { position: 0, velocity: 0, phase: 'PARKED' };
        expect(motion.evaluate(endTai)).toEqual(parked);
        expect(motion.evaluate(endTai + 100)).toEqual(parked);
    });

    it('is idempotent once parked', () => {
        const motion = createMotion(0.5);
        const first = motion.park(0);
        expect(first).toBeCloseTo(0.5, 12);

        expect(motion.park(10)).toBe(10);
        expect(motion.evaluate(10)).toEqual({ position: 0, velocity: 0, phase: 'PARKED' });
    });
});

describe('AzimuthMotion validation', () => {
    it('rejects a crawl velocity above the max speed without changing state', () => {
        const motion = createMotion();
        motion.setTarget(0, 1.0, 0.5, 'MOVING');
        const state = motion.getState();
        const before = motion.evaluate(3);

        expect(() => motion.setTarget(2, 2.0, 1.5, 'MOVING')).toThrow(InvalidCommandError);
        expect(() => motion.setTarget(2, 2.0, -1.5, 'MOVING')).toThrow(
            'The target crawl speed 1.5 is larger than the max speed 1',
        );

        expect(motion.getState()).toBe(state);
        expect(motion.evaluate(3)).toStrictEqual(before);
    });

    it('only accepts MOVING or CRAWLING as requested phase', () => {
        const motion = createMotion();
        expect(() => motion.setTarget(0, 1.0, 0, 'PARKING')).toThrow(InvalidCommandError);
        expect(() => motion.setTarget(0, 1.0, 0, 'STOPPED')).toThrow(
            'Requested phase should be MOVING or CRAWLING, got STOPPED',
        );
    });

    it('requires a finite target when moving', () => {
        const motion = createMotion();
        expect(() => motion.setTarget(0, Number.POSITIVE_INFINITY, 0, 'MOVING')).toThrow(
            InvalidCommandError,
        );
    });

    it('rejects commands issued before the current plan started', () => {
        const motion = createMotion();
        motion.setTarget(5, 1.0, 0, 'MOVING');
        const state = motion.getState();

        expect(() => motion.setTarget(4, 2.0, 0, 'MOVING')).toThrow(TimeTravelError);
        expect(() => motion.stop(4)).toThrow(TimeTravelError);
        expect(() => motion.park(4)).toThrow(TimeTravelError);
        expect(motion.getState()).toBe(state);
    });

    it('rejects a non-positive max speed', () => {
        expect(() => createMotion(0, 0)).toThrow(InvalidCommandError);
        expect(() => createMotion().setMaxSpeed(-1)).toThrow(InvalidCommandError);
    });
});

describe('AzimuthMotion max speed changes', () => {
    it('keeps the speed of the plan in progress and uses the new one next', () => {
        const motion = createMotion();
        motion.setTarget(0, 2.0, 0, 'MOVING');
        motion.setMaxSpeed(0.5);

        expect(motion.evaluate(1).velocity).toBe(1.0);
        expect(motion.setTarget(2, 0, 0, 'MOVING')).toBe(4);
        expect(motion.evaluate(3).velocity).toBe(-0.5);
    });
});

describe('evaluateMotion', () => {
    it('fails on a crawl that claims a transit leg', () => {
        const state: EngineState = {
            startPosition: 0,
            startTime: 0,
            endPosition: 1,
            endTime: 1,
            crawlVelocity: 0.1,
            commandedPhase: 'CRAWLING',
            maxSpeed: 1,
        };
        expect(() => evaluateMotion(state, 0.5)).toThrow(UnreachablePhaseError);
    });

    it('reports STOPPED with zero velocity inside a stopping leg', () => {
        const state: EngineState = {
            startPosition: 0,
            startTime: 0,
            endPosition: 1,
            endTime: 1,
            crawlVelocity: 0,
            commandedPhase: 'STOPPING',
            maxSpeed: 1,
        };
        expect(evaluateMotion(state, 0.5)).toEqual({ position: 0.5, velocity: 0, phase: 'STOPPED' });
        expect(evaluateMotion(state, 2)).toEqual({ position: 1, velocity: 0, phase: 'STOPPED' });
    });
});
