import type { Result } from '../shared/types/index.js';
import { match } from '../shared/types/index.js';
import { createLogger, type Logger } from '../shared/logging/logger.js';
import { getConfigManager, type ConfigManager } from '../config/config-loader.js';
import { formatConfigurationError, type ConfigurationError } from '../config/errors.js';
import { createAppContext, describeContext, type AppContext, type AppContextOptions } from './app-context.js';

export interface BootstrapOptions extends AppContextOptions {
  manager?: ConfigManager;
  /** コンテキスト作成前のエラー出力先 */
  logger?: Logger;
}

/**
 * 起動処理
 *
 * 設定を一度だけ初期化し、コンテキストを返す。
 * 不完全な設定のまま先へ進まない。
 */
export function bootstrap(
  options: BootstrapOptions = {}
): Result<AppContext, ConfigurationError> {
  const { manager = getConfigManager(), logger = createLogger(), ...contextOptions } = options;
  const result = createAppContext(manager, contextOptions);

  match(result, {
    success: (context) => {
      context.logger.info('Configuration ready', describeContext(context));
    },
    error: (error) => {
      logger.error('Startup aborted due to invalid configuration', {
        detail: formatConfigurationError(error)
      });
    }
  });

  return result;
}
