// packages/core/src/errors/index.ts

export class EnvelopeError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/* ----------  stream I/O  ------------------------------------------ */
export class IOError                    extends EnvelopeError {}
/** Zero bytes were available where an envelope could have started. */
export class EndOfStreamError           extends IOError {}
/** The stream ended part-way through a field or payload. */
export class UnexpectedEndOfStreamError extends IOError {}
export class ShortWriteError            extends IOError {}

/* ----------  header  ---------------------------------------------- */
export class OverflowError              extends EnvelopeError {}
export class ForwardCompatibilityError  extends EnvelopeError {}
export class InvalidHeaderError         extends EnvelopeError {}

/* ----------  everything else  ------------------------------------- */
export class PayloadCodecError          extends EnvelopeError {}
export class VersionError               extends EnvelopeError {}
/** Broken bookkeeping inside this library; report it as a bug. */
export class InternalError              extends EnvelopeError {}
export class FilesystemError            extends EnvelopeError {}
