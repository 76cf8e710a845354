import mqtt, { type IClientOptions, type MqttClient as MqttJsClient } from 'mqtt';

import { AMCS_COMMAND_TOPIC } from '../constants/control';

import type { ScopedLogger } from './logStore';
import type { MockAmcsTransport, MockTransportMessage } from './mockTransport';

export type BridgeState =
    | { status: 'disconnected'; lastError?: string }
    | { status: 'connecting'; attempt: number }
    | { status: 'connected'; since: number }
    | { status: 'reconnecting'; attempt: number; retryAt: number; lastError?: string };

export interface BrokerRequest {
    url: string;
    username?: string;
    password?: string;
}

export type ClientFactory = (url: string, options: IClientOptions) => MqttJsClient;

type StateListener = (state: BridgeState) => void;

export const BASE_RETRY_DELAY_MS = 2_000;
export const MAX_RETRY_DELAY_MS = 30_000;

const defaultFactory: ClientFactory = (url, options) => mqtt.connect(url, options);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const retryDelayMs = (attempt: number): number =>
    Math.min(BASE_RETRY_DELAY_MS * 2 ** Math.max(0, attempt - 1), MAX_RETRY_DELAY_MS);

/**
 * Exposes the mock AMCS on an MQTT broker: commands arriving on the command
 * topic go to the transport, and everything the transport emits (status
 * snapshots, command responses) is published to the broker. The telemetry
 * loop only runs while the broker connection is up.
 */
export class AmcsMqttBridge {
    private readonly transport: MockAmcsTransport;

    private readonly createClient: ClientFactory;

    private readonly logger: ScopedLogger | null;

    private readonly listeners = new Set<StateListener>();

    private client: MqttJsClient | null = null;

    // Null while the bridge is meant to be offline; events from a released client are ignored then.
    private request: BrokerRequest | null = null;

    private retryTimer: ReturnType<typeof setTimeout> | null = null;

    private failures = 0;

    private state: BridgeState = { status: 'disconnected' };

    constructor(
        transport: MockAmcsTransport,
        factory: ClientFactory = defaultFactory,
        logger?: ScopedLogger,
    ) {
        this.transport = transport;
        this.createClient = factory;
        this.logger = logger ?? null;
    }

    public getState(): BridgeState {
        return this.state;
    }

    /** Registers a listener, calls it with the current state and returns its unsubscribe. */
    public onStateChange(listener: StateListener): () => void {
        this.listeners.add(listener);
        listener(this.state);
        return () => {
            this.listeners.delete(listener);
        };
    }

    public connect(request: BrokerRequest): void {
        this.stopRetrying();
        this.request = request;
        this.failures = 0;
        this.openClient({ status: 'connecting', attempt: 0 });
    }

    /** Stops telemetry, drops the broker connection and cancels any pending retry. */
    public disconnect(): void {
        this.request = null;
        this.stopRetrying();
        this.transport.disconnect();
        this.closeClient();
        this.setState({ status: 'disconnected' });
    }

    private openClient(state: BridgeState): void {
        const request = this.request;
        if (!request) {
            return;
        }
        this.closeClient();
        this.setState(state);

        let client: MqttJsClient;
        try {
            client = this.createClient(request.url, {
                username: request.username,
                password: request.password,
                reconnectPeriod: 0,
                clean: true,
                keepalive: 60,
            });
        } catch (error) {
            this.logger?.logError('Failed to create MQTT client', { url: request.url, error: errorMessage(error) });
            this.connectionLost(errorMessage(error));
            return;
        }

        client.on('connect', this.handleConnect);
        client.on('close', () => this.connectionLost());
        client.on('error', (error: Error) => {
            this.logger?.logWarning('MQTT connection error', { error: error.message });
            this.connectionLost(error.message);
        });
        client.on('message', this.handleCommand);
        this.client = client;
    }

    private closeClient(): void {
        if (!this.client) {
            return;
        }
        this.client.removeAllListeners();
        this.client.end(true);
        this.client = null;
    }

    private handleConnect = (): void => {
        this.stopRetrying();
        this.failures = 0;
        this.setState({ status: 'connected', since: Date.now() });
        this.client?.subscribe(AMCS_COMMAND_TOPIC, { qos: 1 }, (error) => {
            if (error) {
                this.logger?.logError('Failed to subscribe to command topic', {
                    topic: AMCS_COMMAND_TOPIC,
                    error: error.message,
                });
            }
        });
        this.transport.connect(this.forwardToBroker);
    };

    private handleCommand = (topic: string, payload: Uint8Array): void => {
        this.transport.publish(topic, payload).catch((error: unknown) => {
            this.logger?.logError('Failed to handle command', { topic, error: errorMessage(error) });
        });
    };

    private forwardToBroker = ({ topic, payload }: MockTransportMessage): void => {
        if (!this.client || this.state.status !== 'connected') {
            return;
        }
        this.client.publish(topic, Buffer.from(payload), { qos: 0 }, (error) => {
            if (error) {
                this.logger?.logWarning('Failed to publish message', { topic, error: error.message });
            }
        });
    };

    // Telemetry pauses while the broker is unreachable; one retry is pending at a time.
    private connectionLost(lastError?: string): void {
        if (!this.request) {
            return;
        }
        this.transport.disconnect();
        if (this.retryTimer) {
            return;
        }

        this.failures += 1;
        const attempt = this.failures;
        const delay = retryDelayMs(attempt);
        this.setState({ status: 'reconnecting', attempt, retryAt: Date.now() + delay, lastError });

        this.retryTimer = setTimeout(() => {
            this.retryTimer = null;
            this.openClient({ status: 'connecting', attempt });
        }, delay);
    }

    private stopRetrying(): void {
        if (this.retryTimer) {
            clearTimeout(this.retryTimer);
            this.retryTimer = null;
        }
    }

    private setState(state: BridgeState): void {
        this.state = state;
        this.listeners.forEach((listener) => listener(state));
    }
}
