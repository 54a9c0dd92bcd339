/**
 * Device-scoped MQTT topics and payloads
 */

export type DeviceStatus = 'online' | 'offline';

export function statusTopic(deviceId: string): string {
  return `device/${deviceId}/status`;
}

export function measurementTopic(deviceId: string): string {
  return `device/${deviceId}/measurement`;
}

/**
 * {"status":"online"}
 */
export function statusPayload(status: DeviceStatus): string {
  return JSON.stringify({ status });
}
