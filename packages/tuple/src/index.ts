/**
 * @untagged/tuple
 *
 * Generation engine for untagged tuple shapes: field tables, call
 * classification, construction/update/access planning and code emission.
 */

export * from "./types.js";
export * from "./errors.js";
export {
  buildFieldTable,
  createShapeDescriptor,
  fieldNames,
  findUnescapable,
  resolveIndex,
  type FieldEntry,
} from "./fields.js";
export {
  classifyArguments,
  readAssociationList,
  type CallSiteArgument,
  type CallSiteKind,
} from "./classify.js";
export {
  planConstruct,
  planConversion,
  planUpdate,
  requireIndex,
  type ConstructSlot,
  type UpdateStep,
} from "./plan.js";
export { TsCodeEmitter, emitShapeInfo, type CodeEmitter, type TsCodeEmitterOptions } from "./emitter.js";
export { generateShapeCall } from "./generate.js";
export { buildPattern, emitPatternTest, type PatternNode, type ShapeLookup } from "./pattern.js";
export { readDefinition, tryReadDefinition, type DefinitionResult } from "./definition.js";
export {
  createMatchesMacro,
  createShapeMacro,
  deftupleMacro,
  deftuplepMacro,
  type ShapeServices,
} from "./macros.js";
