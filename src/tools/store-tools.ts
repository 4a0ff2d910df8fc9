import { z } from 'zod';
import { ISettingsStore } from '../interfaces/settings_store.interface.js';
import { ToolPayload } from '../types/index.js';
import { ToolRegistry } from './tool-registry.js';

export const STORE_SETTING_PREFIX = 'store:';

const SettingIdSchema = z.string().regex(/^[a-z0-9_]+$/, 'setting ids use lowercase letters, digits and underscores');

const GetSettingArgsSchema = z.object({ settingId: SettingIdSchema });
const UpdateSettingArgsSchema = z.object({ settingId: SettingIdSchema, value: z.string() });

function invalidArguments(error: z.ZodError): ToolPayload {
  const issue = error.issues[0];
  const field = issue?.path.join('.') || 'arguments';
  return { success: false, message: `Invalid ${field}: ${issue?.message ?? 'unexpected value'}` };
}

/**
 * Store configuration tools backed by the settings store. Values are kept
 * under `store:<settingId>`.
 */
export function registerStoreTools(registry: ToolRegistry, store: ISettingsStore): void {
  registry.register('get_setting', {
    description: 'Read a store setting, such as guest_checkout or coupons_enabled.',
    parameterSchema: {
      type: 'object',
      properties: {
        settingId: { type: 'string', description: 'The setting id, e.g. "guest_checkout".' },
      },
      required: ['settingId'],
    },
    callback: async args => {
      const parsed = GetSettingArgsSchema.safeParse(args);
      if (!parsed.success) {
        return invalidArguments(parsed.error);
      }
      const { settingId } = parsed.data;
      const value = await store.get(STORE_SETTING_PREFIX + settingId, '');
      return value === ''
        ? { success: false, message: `Setting "${settingId}" is not set.` }
        : { success: true, message: `${settingId} is "${value}".`, settingId, value };
    },
  });

  registry.register('update_setting', {
    description: 'Update a store setting. Use this to enable or disable features like guest checkout.',
    parameterSchema: {
      type: 'object',
      properties: {
        settingId: { type: 'string', description: 'The setting id, e.g. "guest_checkout".' },
        value: { type: 'string', description: 'The new value, e.g. "yes" or "no".' },
      },
      required: ['settingId', 'value'],
    },
    callback: async args => {
      const parsed = UpdateSettingArgsSchema.safeParse(args);
      if (!parsed.success) {
        return invalidArguments(parsed.error);
      }
      const { settingId, value } = parsed.data;
      const previous = await store.get(STORE_SETTING_PREFIX + settingId, '');
      await store.set(STORE_SETTING_PREFIX + settingId, value);
      return { success: true, message: `Updated ${settingId} to "${value}".`, settingId, value, previous };
    },
  });

  registry.register('reset_setting', {
    description: 'Clear a store setting so the store falls back to its default. Cannot be undone.',
    parameterSchema: {
      type: 'object',
      properties: {
        settingId: { type: 'string', description: 'The setting id to clear.' },
      },
      required: ['settingId'],
    },
    callback: async args => {
      const parsed = GetSettingArgsSchema.safeParse(args);
      if (!parsed.success) {
        return invalidArguments(parsed.error);
      }
      const { settingId } = parsed.data;
      await store.set(STORE_SETTING_PREFIX + settingId, '');
      return { success: true, message: `Cleared ${settingId}.`, settingId };
    },
    destructive: true,
  });
}
