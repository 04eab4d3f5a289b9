// ═══════════════════════════════════════════════════════════════════════════
// Scene Errors
// Every failure the authoring and compile layers raise. Tick evaluation has
// no error channel and never throws.
// ═══════════════════════════════════════════════════════════════════════════

export class SceneError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** A record is malformed: bad time, colour, name, action kind or config value. */
export class ValidationError extends SceneError {}

/** The compile protocol was used out of order. Programmer error, never retried. */
export class PreconditionError extends SceneError {}

/** A persisted document is missing required elements or holds unparsable values. */
export class MalformedDocumentError extends SceneError {}

/** An object or group referenced by a trigger does not exist in the scene. */
export class UnresolvedReferenceError extends SceneError {
  constructor(readonly reference: string, context: string) {
    super(`${context}: cannot resolve '${reference}'`)
  }
}

export class NameCollisionError extends SceneError {
  constructor(readonly takenName: string, readonly takenBy: string) {
    super(`Name '${takenName}' is already in use by a ${takenBy}`)
  }
}

/** Emitted host logic failed to compile. */
export class GeneratedLogicError extends SceneError {
  constructor(readonly module: string, detail: string) {
    super(`Generated logic for '${module}' does not compile: ${detail}`)
  }
}
