// Built-in rule set, used when no rules file is found on disk.

export const EMBEDDED_SOURCE = 'embedded';

export const DEFAULT_RULES = `# dmesg-triage default rules
# Lines are checked against critical, error, warning, info in that order.
# Matching is a case-insensitive substring search.

[critical]
keywords = ["panic", "oops", "call trace", "bug:", "hardware error"]
color = "bold-red"
icon = "🔥"

[error]
keywords = ["error", "fail", "segfault", "timed out"]
color = "red"
icon = "❌"

[warning]
keywords = ["warn", "deprecated", "throttl"]
color = "yellow"
icon = "⚠️"

[info]
keywords = []
color = "green"
icon = "ℹ️"
`;
