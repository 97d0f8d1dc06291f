// System Resolver
// Pure function — maps a destination URL to a downstream system profile.

export const SYSTEM_NAMES = ['jira', 'freshservice', 'slack', 'webhook_test', 'unknown'] as const;
export type SystemName = (typeof SYSTEM_NAMES)[number];

// Checked in order against the lowercased host
const HOST_RULES: Array<{ fragments: string[]; system: SystemName }> = [
  { fragments: ['atlassian.net', 'jira'], system: 'jira' },
  { fragments: ['freshservice'],          system: 'freshservice' },
  { fragments: ['slack.com'],             system: 'slack' },
  { fragments: ['webhook.site'],          system: 'webhook_test' },
];

function hostOf(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Resolves the system profile for an endpoint URL.
 * Total: anything unrecognised, including an unparseable URL, is 'unknown'.
 */
export function resolveSystem(url: string): SystemName {
  const host = hostOf(url);
  if (!host) return 'unknown';

  const rule = HOST_RULES.find((r) => r.fragments.some((fragment) => host.includes(fragment)));
  return rule ? rule.system : 'unknown';
}
