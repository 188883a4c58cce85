import { UpdateErrorCode } from '@tidewater/shared';

const RESPONSE_NOT_FOUND = 'The update server could not be found.';
const RESPONSE_EMPTY = 'The update server returned an empty response.';
const RESPONSE_INVALID = 'Invalid response from the update server.';

/**
 * Base class for every failure of the update pipeline.
 */
export class UpdateError extends Error {
  constructor(
    public readonly code: UpdateErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): { error: UpdateErrorCode; message: string } {
    return { error: this.code, message: this.message };
  }
}

export class GatewayNotFoundError extends UpdateError {
  constructor() {
    super(UpdateErrorCode.NOT_FOUND, RESPONSE_NOT_FOUND);
  }
}

export class GatewayBadResponseError extends UpdateError {
  constructor(body?: string) {
    super(UpdateErrorCode.BAD_RESPONSE, body && body.length > 0 ? body : RESPONSE_EMPTY);
  }
}

export class GatewayInvalidResponseError extends UpdateError {
  constructor(detail?: string, options?: { cause?: unknown }) {
    super(
      UpdateErrorCode.INVALID_RESPONSE,
      detail ? `${RESPONSE_INVALID} (${detail})` : RESPONSE_INVALID,
      options,
    );
  }
}

export class GatewayBadSignatureError extends UpdateError {
  constructor() {
    super(UpdateErrorCode.BAD_SIGNATURE, `${RESPONSE_INVALID} (Bad signature)`);
  }
}

export class ArtifactHashMismatchError extends UpdateError {
  constructor(
    public readonly fileCode: string,
    public readonly expectedHash: string,
    public readonly actualHash: string,
  ) {
    super(
      UpdateErrorCode.HASH_MISMATCH,
      `Downloaded file ${fileCode} has hash ${actualHash}, expected ${expectedHash}`,
    );
  }
}

export class ExtractionFailedError extends UpdateError {
  constructor(public readonly filePath: string, options?: { cause?: unknown }) {
    super(UpdateErrorCode.EXTRACTION_FAILED, `Unable to extract the file ${filePath}`, options);
  }
}

export class VersionNotFoundError extends UpdateError {
  constructor(public readonly unitCode: string, public readonly version: string) {
    super(
      UpdateErrorCode.VERSION_NOT_FOUND,
      `Version ${version} of ${unitCode} is not recorded in the migration ledger`,
    );
  }
}

export class UnitNotFoundError extends UpdateError {
  constructor(public readonly unitCode: string) {
    super(UpdateErrorCode.UNIT_NOT_FOUND, `Unable to find: ${unitCode}`);
  }
}
