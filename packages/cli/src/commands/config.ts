/**
 * @fileoverview Command setup for 'forkferry config'
 *
 * Shows or changes the defaults in ~/.forkferry/config.jsonc.
 */

import { CONFIG_KEYS, configManager, isConfigKey } from '@forkferry/core/core/config.js';
import { resolveOutput } from '@forkferry/core/core/ports/resolve.js';
import { ConfigError } from '@forkferry/core/utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';

export interface ConfigCommandOptions {
  reset?: boolean;
}

export async function setupConfigCommand(
  key: string | undefined,
  value: string | undefined,
  options: ConfigCommandOptions
): Promise<void> {
  const ctx = await createCliExecutionContext();
  const out = resolveOutput(ctx);

  if (options.reset) {
    await configManager.reset();
    out.success(`Configuration reset: ${await configManager.getConfigFilePath()}`);
    return;
  }

  if (key === undefined) {
    const config = await configManager.getAll();
    const width = Math.max(...CONFIG_KEYS.map(k => k.length));
    out.note(
      CONFIG_KEYS.map(k => `${k.padEnd(width)}  ${String(config[k])}`).join('\n'),
      await configManager.getConfigFilePath()
    );
    return;
  }

  if (value === undefined) {
    if (!isConfigKey(key)) {
      throw new ConfigError(`Unknown setting: ${key} (known: ${CONFIG_KEYS.join(', ')})`);
    }
    out.message(String(await configManager.get(key)));
    return;
  }

  const parsed = await configManager.setFromString(key, value);
  out.success(`${parsed.key} = ${String(parsed.value)}`);
}
