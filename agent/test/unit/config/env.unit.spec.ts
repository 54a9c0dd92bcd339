import path from 'path';
import { loadEnvironment } from '../../../src/config/env';
import { InvalidEnvironmentError, StartupFatalError } from '../../../src/errors';

describe('loadEnvironment', () => {
	const cwd = path.resolve('/srv/grid-device');

	it('should apply defaults relative to the working directory', () => {
		expect(loadEnvironment({}, cwd)).toEqual({
			identityPath: path.join(cwd, 'device.json'),
			settingsPath: path.join(cwd, 'config.yaml'),
			logLevel: 'info',
			logFormat: 'pretty',
			settingsPollIntervalMs: 1000,
		});
	});

	it('should read overrides', () => {
		const environment = loadEnvironment(
			{
				DEVICE_IDENTITY_PATH: 'identity/meter.json',
				SETTINGS_PATH: path.resolve('/etc/grid-device/config.yaml'),
				LOG_LEVEL: 'debug',
				LOG_FORMAT: 'json',
				SETTINGS_POLL_INTERVAL_MS: '250',
			},
			cwd,
		);

		expect(environment).toEqual({
			identityPath: path.join(cwd, 'identity', 'meter.json'),
			settingsPath: path.resolve('/etc/grid-device/config.yaml'),
			logLevel: 'debug',
			logFormat: 'json',
			settingsPollIntervalMs: 250,
		});
	});

	it('should treat an invalid environment as fatal at startup', () => {
		let caught: unknown;
		try {
			loadEnvironment({ LOG_LEVEL: 'verbose', SETTINGS_POLL_INTERVAL_MS: '0' }, cwd);
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(InvalidEnvironmentError);
		expect(caught).toBeInstanceOf(StartupFatalError);
		if (caught instanceof InvalidEnvironmentError) {
			expect(caught.issues).toHaveLength(2);
			expect(caught.issues[0]).toMatch(/^LOG_LEVEL: /);
			expect(caught.issues[1]).toMatch(/^SETTINGS_POLL_INTERVAL_MS: /);
		}
	});
});
