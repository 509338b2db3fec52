/**
 * @curvelink/scene - a Yjs scene document hosting the curvelink engine
 */

export { YjsScene, type NewSourceObject } from './YjsScene.js';
export { createSceneHost, type SceneHost, type SceneHostOptions } from './host.js';
export { ControlNetEvaluator, UnsupportedModifierError, sampleBezier, type Sample } from './evaluator.js';
export { createSceneDocument, loadSceneDocument, saveSceneDocument } from './createDocument.js';
export { openSceneDocument, type SceneDocument } from './yjs.js';
export { batchFromEvents, type NameLookup } from './changeFeed.js';
export {
  assertValidDocument,
  validateDocument,
  validateInvariants,
  validateSchema,
  type ValidationResult,
} from './validate.js';
export { SceneDocumentError, UnknownEntityError } from './errors.js';
export * from './schema.js';
