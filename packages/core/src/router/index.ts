export {
  classify,
  detectCategory,
  findAutonomousPhrase,
  isEnumeratedRequest,
  hasSequencingConnective,
  hasNumberedList,
  isLongRequest,
  ENUMERATION_MIN_COMMAS,
  ENUMERATION_MIN_LENGTH,
  LONG_REQUEST_LENGTH,
} from './classifier.js'
export type { Classification, InteractionMode, AutonomousTrigger } from './classifier.js'
export { loadKeywordConfig, parseKeywordConfig } from './keywords.js'
export type { KeywordConfig, KeywordLoadOptions } from './keywords.js'
export { Router } from './router.js'
export type { RouterOptions, RouteDecision } from './router.js'
