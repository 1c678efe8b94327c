import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Severity } from '../../domain/index.js';
import { SEVERITY_RANK } from '../../domain/index.js';
import { parseSimpleYaml } from '../config/simple-yaml.js';

/**
 * Notification channel configuration loaded from YAML.
 */
export interface NotificationConfig {
  /** Recommendations below this severity are never dispatched. */
  min_severity: Severity;
  slack: { enabled: boolean; webhook_url: string };
}

/**
 * Default configuration: high and critical only, Slack disabled.
 */
export const DEFAULT_CONFIG: NotificationConfig = {
  min_severity: 'high',
  slack: { enabled: false, webhook_url: '' },
};

function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && Object.hasOwn(SEVERITY_RANK, value);
}

/**
 * Loads notification configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unreadable.
 * Merges loaded values over defaults so missing keys get default values.
 */
export function loadNotificationConfig(
  configPath?: string,
): NotificationConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'notifications.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  const parsed = parseSimpleYaml(content);
  const general = parsed['notifications'] ?? {};
  const slack = parsed['slack'] ?? {};

  return {
    min_severity: isSeverity(general['min_severity']) ? general['min_severity'] : DEFAULT_CONFIG.min_severity,
    slack: {
      enabled: typeof slack['enabled'] === 'boolean' ? slack['enabled'] : DEFAULT_CONFIG.slack.enabled,
      webhook_url: typeof slack['webhook_url'] === 'string' ? slack['webhook_url'] : DEFAULT_CONFIG.slack.webhook_url,
    },
  };
}
