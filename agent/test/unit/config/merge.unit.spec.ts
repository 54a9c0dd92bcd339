import {
	formatChanges,
	isEmptyChangeRecord,
	mergeSettings,
	requiresReconnect,
	toIdentityRecord,
	toSettingsPatch,
} from '../../../src/config/merge';
import { DEFAULT_RUNTIME_SETTINGS } from '../../../src/config/types';

describe('settings merge', () => {
	describe('toIdentityRecord', () => {
		it('should prefer power over rated_power', () => {
			expect(toIdentityRecord({ device_id: 'dev-42', power: 100, rated_power: 90 })).toEqual({
				deviceId: 'dev-42',
				ratedPower: 100,
			});
		});

		it('should fall back to rated_power', () => {
			expect(toIdentityRecord({ device_id: 'dev-42', rated_power: 90 }).ratedPower).toBe(90);
		});
	});

	describe('toSettingsPatch', () => {
		it('should map every section key to its settings field', () => {
			const patch = toSettingsPatch({
				mqtt: { host: 'broker.local', port: 8883, client_id: 'meter-north' },
				app: { poll_interval: 10, heartbeat_interval: 60 },
				logging: { level: 'debug' },
			});

			expect(patch).toEqual({
				brokerHost: 'broker.local',
				brokerPort: 8883,
				clientId: 'meter-north',
				pollIntervalSeconds: 10,
				heartbeatIntervalSeconds: 60,
				logLevel: 'debug',
			});
		});

		it('should leave out absent keys and empty sections', () => {
			expect(toSettingsPatch({ mqtt: { port: 1884 }, app: null })).toEqual({ brokerPort: 1884 });
			expect(toSettingsPatch({})).toEqual({});
		});
	});

	describe('mergeSettings', () => {
		it('should return a frozen record and the per-field differences', () => {
			const { settings, changes } = mergeSettings(DEFAULT_RUNTIME_SETTINGS, {
				brokerPort: 1884,
				pollIntervalSeconds: 5,
			});

			expect(settings).toEqual({ ...DEFAULT_RUNTIME_SETTINGS, brokerPort: 1884 });
			expect(Object.isFrozen(settings)).toBe(true);
			expect(changes).toEqual({ brokerPort: { old: 1883, new: 1884 } });
		});

		it('should not touch the current record', () => {
			const current = { ...DEFAULT_RUNTIME_SETTINGS };

			mergeSettings(current, { brokerHost: 'broker.local' });

			expect(current.brokerHost).toBe('localhost');
		});

		it('should produce an empty change record for an empty patch', () => {
			const { changes } = mergeSettings(DEFAULT_RUNTIME_SETTINGS, {});

			expect(isEmptyChangeRecord(changes)).toBe(true);
		});
	});

	describe('requiresReconnect', () => {
		it.each([
			['brokerHost', { brokerHost: { old: 'localhost', new: 'broker.local' } }],
			['brokerPort', { brokerPort: { old: 1883, new: 1884 } }],
			['clientId', { clientId: { old: null, new: 'meter-north' } }],
		])('should require a reconnect when %s changes', (_field, changes) => {
			expect(requiresReconnect(changes)).toBe(true);
		});

		it('should not require a reconnect for interval or log level changes', () => {
			expect(
				requiresReconnect({
					pollIntervalSeconds: { old: 5, new: 10 },
					heartbeatIntervalSeconds: { old: 30, new: 60 },
					logLevel: { old: 'info', new: 'debug' },
				}),
			).toBe(false);
		});
	});

	describe('formatChanges', () => {
		it('should list changes in document order with dotted names', () => {
			expect(
				formatChanges({
					logLevel: { old: 'info', new: 'warn' },
					brokerPort: { old: 1883, new: 1884 },
					clientId: { old: null, new: 'meter-north' },
				}),
			).toBe('mqtt.port: 1883 → 1884, mqtt.client_id: null → meter-north, logging.level: info → warn');
		});
	});
});
