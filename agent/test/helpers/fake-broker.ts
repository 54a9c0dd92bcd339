/**
 * In-process broker for Connection Manager tests
 * ===============================================
 *
 * Implements SessionFactory without a network. Every connection, publish,
 * clean disconnect and dropped session is appended to `events` in order.
 *
 * Usage:
 *   const broker = new FakeBroker();
 *   broker.refuseNext(3);                  // first 3 attempts fail
 *   broker.sessions[0].drop();             // simulate a lost connection
 *   broker.timeline();                     // ['connect localhost:1883', ...]
 */

import { stub } from 'sinon';
import type { SinonStub } from 'sinon';
import type {
	BrokerSession,
	PublishOptions,
	SessionFactory,
	SessionOptions,
	SessionTarget,
	WillMessage,
} from '../../src/mqtt/session';

export interface PublishedMessage extends PublishOptions {
	target: SessionTarget;
	topic: string;
	payload: string;
}

export type BrokerEvent =
	| { type: 'connect'; target: SessionTarget; will: WillMessage }
	| { type: 'publish'; message: PublishedMessage }
	| { type: 'end'; target: SessionTarget }
	| { type: 'drop'; target: SessionTarget };

export class FakeSession implements BrokerSession {
	public ended = false;
	public closed = false;
	/** Reject every publish while set */
	public failPublishes = false;
	private closeListeners: Array<() => void> = [];

	constructor(
		public readonly target: SessionTarget,
		private readonly broker: FakeBroker,
	) {}

	async publish(topic: string, payload: string, options: PublishOptions): Promise<void> {
		if (this.failPublishes || this.closed) {
			throw new Error(`Publish rejected: ${topic}`);
		}
		this.broker.record({
			type: 'publish',
			message: { target: this.target, topic, payload, qos: options.qos, retain: options.retain },
		});
	}

	async end(): Promise<void> {
		if (this.ended || this.closed) {
			this.ended = true;
			return;
		}
		this.ended = true;
		this.broker.record({ type: 'end', target: this.target });
		this.close();
	}

	onClose(listener: () => void): void {
		if (this.closed) {
			listener();
			return;
		}
		this.closeListeners.push(listener);
	}

	/**
	 * Connection lost without a clean disconnect
	 */
	drop(): void {
		this.broker.record({ type: 'drop', target: this.target });
		this.close();
	}

	private close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		const listeners = this.closeListeners;
		this.closeListeners = [];
		listeners.forEach((listener) => listener());
	}
}

export function connectionRefused(host = 'localhost', port = 1883): Error {
	return Object.assign(new Error(`connect ECONNREFUSED ${host}:${port}`), { code: 'ECONNREFUSED' });
}

export class FakeBroker implements SessionFactory {
	public readonly connectStub: SinonStub<[SessionOptions], Promise<BrokerSession>>;
	public readonly sessions: FakeSession[] = [];
	public readonly events: BrokerEvent[] = [];

	constructor() {
		this.connectStub = stub<[SessionOptions], Promise<BrokerSession>>();
		this.connectStub.callsFake((options) => this.accept(options));
	}

	connect(options: SessionOptions): Promise<BrokerSession> {
		return this.connectStub(options);
	}

	/**
	 * Default connect behaviour: establish a session
	 */
	async accept(options: SessionOptions): Promise<FakeSession> {
		const target: SessionTarget = { host: options.host, port: options.port, clientId: options.clientId };
		const session = new FakeSession(target, this);
		this.sessions.push(session);
		this.record({ type: 'connect', target, will: options.will });
		return session;
	}

	/**
	 * Fail the next `count` connection attempts with ECONNREFUSED
	 */
	refuseNext(count: number): void {
		const first = this.connectStub.callCount;
		for (let i = 0; i < count; i++) {
			this.connectStub.onCall(first + i).rejects(connectionRefused());
		}
	}

	record(event: BrokerEvent): void {
		this.events.push(event);
	}

	messages(): PublishedMessage[] {
		const messages: PublishedMessage[] = [];
		for (const event of this.events) {
			if (event.type === 'publish') {
				messages.push(event.message);
			}
		}
		return messages;
	}

	publishedTo(topic: string): PublishedMessage[] {
		return this.messages().filter((message) => message.topic === topic);
	}

	/**
	 * One line per event, e.g. `publish localhost:1883 device/dev-42/status {"status":"online"}`
	 */
	timeline(): string[] {
		return this.events.map((event) => {
			switch (event.type) {
				case 'publish': {
					const { target, topic, payload } = event.message;
					return `publish ${target.host}:${target.port} ${topic} ${payload}`;
				}
				default:
					return `${event.type} ${event.target.host}:${event.target.port}`;
			}
		});
	}

	reset(): void {
		this.connectStub.resetHistory();
		this.sessions.length = 0;
		this.events.length = 0;
	}
}
