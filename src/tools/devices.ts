/**
 * Device Catalog MCP Tools
 *
 * Tools: manual_device_list, manual_device_get
 *
 * @module tools/devices
 */

import { deviceNotFoundError } from '../server/errors.js';
import { requireRuntime } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, DeviceGetInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleDeviceList(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const devices = requireRuntime().listDevices();
    return formatResponse(successResult({ devices, total: devices.length }));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDeviceGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DeviceGetInput, params);
    const device = requireRuntime().getDevice(input.device_type);
    if (!device) {
      throw deviceNotFoundError(input.device_type);
    }
    return formatResponse(successResult(device));
  } catch (error) {
    return handleError(error);
  }
}

export const deviceTools: Record<string, ToolDefinition> = {
  manual_device_list: {
    description:
      'List device types with indexed manuals, with the brands and models known for each. Use the values as query filters.',
    inputSchema: {},
    handler: handleDeviceList,
  },
  manual_device_get: {
    description: 'Get the brands and models with indexed manuals for one device type.',
    inputSchema: DeviceGetInput.shape,
    handler: handleDeviceGet,
  },
};
