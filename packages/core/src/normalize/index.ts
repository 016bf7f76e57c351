export { normalizeStream, parseJson, parsePayload } from './normalize.js';
export { EventSequencer, sequenced } from './sequencer.js';
export { SnapshotDiff, SnapshotDiffs, InlineMarkerSplitter, type ExtractionRule } from './rules.js';
export { DeepSeekRule } from './vendors/deepseek.js';
export { KimiRule } from './vendors/kimi.js';
export { MetasoRule, stripCitations } from './vendors/metaso.js';
export { DoubaoRule } from './vendors/doubao.js';
export { QwenRule } from './vendors/qwen.js';
export { ZhipuRule, type ZhipuRuleHooks } from './vendors/zhipu.js';
export { MinimaxRule, ChatDetailSchema, type ChatDetail } from './vendors/minimax.js';
