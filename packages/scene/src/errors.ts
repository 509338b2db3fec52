/**
 * Scene document errors
 */

/**
 * A document (or a record inside it) does not match the persisted layout
 */
export class SceneDocumentError extends Error {
  constructor(readonly errors: string[]) {
    super(`Invalid scene document:\n${errors.join('\n')}`);
    this.name = 'SceneDocumentError';
  }
}

/**
 * An editing call named an object or resource that does not exist
 */
export class UnknownEntityError extends Error {
  constructor(
    readonly kind: 'object' | 'curve' | 'mesh',
    readonly entityName: string
  ) {
    super(`Unknown ${kind}: ${entityName}`);
    this.name = 'UnknownEntityError';
  }
}
