import type { Result } from '../shared/types/index.js';
import { Ok, Err } from '../shared/types/index.js';
import type { Settings } from '../shared/config/settings-schema.js';
import { PRIVATE_KEY_HEADER } from '../shared/config/default-settings.js';
import {
  type ConfigurationError,
  type ConfigurationWarning,
  createIncompleteCredentialsError,
  createMalformedCredentialFormatWarning
} from './errors.js';

/**
 * 外部ドキュメントDB向けの認証情報
 */
export interface Credentials {
  readonly projectId: string;
  readonly privateKey: string;
  readonly clientEmail: string;
}

export interface CredentialsWithWarnings {
  readonly credentials: Credentials;
  readonly warnings: readonly ConfigurationWarning[];
}

export const REDACTED = '[REDACTED]';

/**
 * Settingsから認証情報を作る
 *
 * - 3項目のいずれかが空なら IncompleteCredentials
 * - 秘密鍵のヘッダ不一致は警告のみ（プロバイダにより形式が違う）
 */
export function createCredentials(
  settings: Settings
): Result<CredentialsWithWarnings, ConfigurationError> {
  const fields = {
    projectId: settings.projectId,
    privateKey: settings.privateKey,
    clientEmail: settings.clientEmail
  };

  const missingFields = Object.entries(fields)
    .filter(([, value]) => value.trim() === '')
    .map(([name]) => name);
  if (missingFields.length > 0) {
    return Err(createIncompleteCredentialsError(missingFields));
  }

  const warnings: ConfigurationWarning[] = [];
  if (!fields.privateKey.startsWith(PRIVATE_KEY_HEADER)) {
    warnings.push(
      createMalformedCredentialFormatWarning(
        'privateKey',
        'Private key may be incorrectly formatted'
      )
    );
  }

  return Ok({
    credentials: Object.freeze(fields),
    warnings: Object.freeze(warnings)
  });
}

/**
 * ログ出力用。秘密鍵を伏せる
 */
export function redactCredentials(credentials: Credentials): Credentials {
  return {
    ...credentials,
    privateKey: REDACTED
  };
}
