export { FormatRuleEngine, DEFAULT_FORMAT_RULES } from './engine'
export type { FormatRuleEngineOptions } from './engine'
export type { FormatRule, FormatRuleContext } from './format-rule'

export { resolveLineFormat } from './line-format'
export { formatLinkAtCaret } from './link-at-caret'
export { resolveInlineFormat } from './inline-format'
export { resolveEmbedStyle } from './embed-style'
