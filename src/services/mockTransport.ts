import {
    AMCS_RESPONSE_TOPIC,
    AMCS_STATUS_TOPIC,
    TELEMETRY_PERIOD_MS,
} from '../constants/control';
import { currentTai, type TaiClock } from '../utils/time';

import type { AmcsStatus } from './amcsStatus';
import { createAck, dispatchCommand, type CommandResponsePayload } from './commandDispatcher';
import { parseCommandMessage } from './commandParser';
import type { ScopedLogger } from './logStore';

export interface MockTransportMessage {
    topic: string;
    payload: Uint8Array;
}

export type MessageHandler = (message: MockTransportMessage) => void;

export interface MockTransportOptions {
    clock?: TaiClock;
    periodMs?: number;
    logger?: ScopedLogger;
}

const encoder = new TextEncoder();

const encodeJson = (value: unknown): Uint8Array => encoder.encode(JSON.stringify(value));

/**
 * In-process stand-in for the AMCS low-level controller. While connected it
 * publishes a status snapshot every period, and it answers each command
 * with an ack followed by done or error.
 */
export class MockAmcsTransport {
    private readonly amcs: AmcsStatus;

    private readonly clock: TaiClock;

    private readonly periodMs: number;

    private readonly logger: ScopedLogger | null;

    private handler: MessageHandler | null = null;

    private interval: ReturnType<typeof setInterval> | null = null;

    constructor(amcs: AmcsStatus, options: MockTransportOptions = {}) {
        this.amcs = amcs;
        this.clock = options.clock ?? currentTai;
        this.periodMs = options.periodMs ?? TELEMETRY_PERIOD_MS;
        this.logger = options.logger ?? null;
    }

    public isConnected(): boolean {
        return this.handler !== null;
    }

    public connect(handler: MessageHandler): void {
        this.disconnect();
        this.handler = handler;
        this.broadcastStatus();
        this.interval = setInterval(() => this.broadcastStatus(), this.periodMs);
    }

    public disconnect(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
        }
        this.handler = null;
    }

    /**
     * Accept a command published on `topic`. Resolves with the final
     * response, or null when the payload could not be parsed.
     */
    public publish(
        topic: string,
        payload: string | Uint8Array,
    ): Promise<CommandResponsePayload | null> {
        const bytes = typeof payload === 'string' ? encoder.encode(payload) : payload;
        const parsed = parseCommandMessage(topic, bytes);
        if (!parsed.ok) {
            this.logger?.logWarning('Rejected command payload', {
                topic,
                reason: parsed.error.reason,
                message: parsed.error.message,
            });
            if (parsed.error.commandId !== undefined) {
                const response: CommandResponsePayload = {
                    commandId: parsed.error.commandId,
                    command: 'unknown',
                    status: 'error',
                    errors: [
                        {
                            code: 'invalid-command',
                            reason: parsed.error.reason,
                            message: parsed.error.message,
                        },
                    ],
                };
                this.emit(AMCS_RESPONSE_TOPIC, response);
                return Promise.resolve(response);
            }
            return Promise.resolve(null);
        }

        this.emit(AMCS_RESPONSE_TOPIC, createAck(parsed.value));
        const response = dispatchCommand(this.amcs, parsed.value, this.clock());
        this.emit(AMCS_RESPONSE_TOPIC, response);
        return Promise.resolve(response);
    }

    private broadcastStatus(): void {
        if (!this.handler) {
            return;
        }
        const tai = this.clock();
        try {
            this.emit(AMCS_STATUS_TOPIC, this.amcs.determineStatus(tai));
        } catch (error) {
            // The cycle's snapshot is lost; the next tick starts afresh.
            this.logger?.logError('Failed to determine AMCS status', {
                tai,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    private emit(topic: string, payload: unknown): void {
        if (!this.handler) {
            return;
        }
        this.handler({ topic, payload: encodeJson(payload) });
    }
}
