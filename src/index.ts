export { formatBoolean, formatResult, addThousandsSeparators } from "./arith/format.js";
export { callFunction, functionNames } from "./arith/functions.js";
export { evaluateExpression, hasComparison, parseTokens, type ArithValue, type RefResolver } from "./arith/parser.js";
export { normalizeExpression, tokenize, type ArithOp, type Token } from "./arith/tokenizer.js";
export {
  MAX_LISTED_SUBNETS,
  resolveEngineConfig,
  type EngineConfig,
  type EngineOptions,
} from "./config.js";
export { Dispatcher, createDefaultEvaluators, type DispatchOutcome } from "./domains/dispatch.js";
export { createArithmeticEvaluator } from "./domains/domain_arith.js";
export { convertBase, createBaseEvaluator } from "./domains/domain_base.js";
export { createDateTimeEvaluator } from "./domains/domain_datetime.js";
export { createNetworkEvaluator } from "./domains/domain_network.js";
export { createPercentageEvaluator } from "./domains/domain_percentage.js";
export {
  HandlerChain,
  NOT_MINE,
  claimed,
  createChainEvaluator,
  defineHandler,
  regexHandler,
  type ChainEvaluatorOptions,
  type Handler,
  type HandlerResult,
} from "./domains/domain_shared.js";
export {
  addressInRange,
  calculateMask,
  hostsInPrefix,
  nextSubnet,
  parseCidr,
  prefixFromMask,
  splitByHostCount,
  splitToSubnets,
  wildcardMask,
  type SubnetInfo,
} from "./domains/network_ipv4.js";
export {
  evaluateDocument,
  evaluateText,
  lineValues,
  renderDocument,
  replaceReferencesWithValues,
  toLineRecords,
} from "./document_evaluate.js";
export {
  extractInlineComment,
  findResultEquals,
  formatExpression,
  hasResult,
  stripResult,
} from "./document_lines.js";
export {
  adjustReferences,
  adjustReferencesForDelete,
  adjustReferencesForInsert,
  detectLineEdit,
  findDependentLines,
  type LineEdit,
} from "./document_refs.js";
export * from "./errors.js";
export type * from "./types.js";
