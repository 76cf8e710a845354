import { AmcsStatus } from './services/amcsStatus';
import { loadAmcsLimitsFromEnv } from './services/limitsConfig';
import { LogStore, consoleSink } from './services/logStore';
import { MockAmcsTransport } from './services/mockTransport';
import { AmcsMqttBridge, type ClientFactory } from './services/mqttClient';
import type { SensorModel } from './services/sensorModel';
import { currentTai, type TaiClock } from './utils/time';

export * from './types';
export * from './constants/control';
export * from './utils/angle';
export * from './utils/commandErrors';
export * from './utils/time';
export * from './services/azimuthMotion';
export * from './services/sensorModel';
export * from './services/amcsStatus';
export * from './services/limitsConfig';
export * from './services/logStore';
export * from './services/commandParser';
export * from './services/commandDispatcher';
export * from './services/mockTransport';
export * from './services/mqttClient';

export interface MockAmcsOptions {
    env?: Record<string, string | undefined>;
    clock?: TaiClock;
    periodMs?: number;
    sensorModel?: SensorModel;
    logStore?: LogStore;
    clientFactory?: ClientFactory;
}

export interface MockAmcs {
    amcs: AmcsStatus;
    transport: MockAmcsTransport;
    bridge: AmcsMqttBridge;
    logStore: LogStore;
}

/**
 * Wire up a mock AMCS: limits from the environment, a log store mirrored to
 * the console, the status aggregator, its transport and the broker bridge.
 * Call `bridge.connect` to start publishing.
 */
export const createMockAmcs = ({
    env = process.env,
    clock = currentTai,
    periodMs,
    sensorModel,
    logStore = new LogStore({ sink: consoleSink }),
    clientFactory,
}: MockAmcsOptions = {}): MockAmcs => {
    const limits = loadAmcsLimitsFromEnv(env);
    const amcs = new AmcsStatus({
        startTai: clock(),
        limits,
        sensorModel,
        logger: logStore.createLogger('amcs'),
    });
    const transport = new MockAmcsTransport(amcs, {
        clock,
        periodMs,
        logger: logStore.createLogger('transport'),
    });
    const bridge = new AmcsMqttBridge(transport, clientFactory, logStore.createLogger('mqtt'));
    return { amcs, transport, bridge, logStore };
};
