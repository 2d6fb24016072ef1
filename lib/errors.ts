// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import { VError } from "verror";

export interface LocalTlsErrorOptions {
    cause?: Error;
}

/**
 * Root of every error raised by localtls.
 *
 * When a `cause` is given, its message is appended to the error message
 * (`"<message>: <cause message>"`) and the original error stays reachable
 * through `VError.cause()`.
 */
export abstract class LocalTlsError extends VError {
    constructor(message: string, options: LocalTlsErrorOptions = {}) {
        super({ cause: options.cause }, "%s", message);
    }

    override get name(): string {
        return this.constructor.name;
    }
}

/**
 * A request, a command line value or a configuration value has been rejected.
 * Nothing has been written to disk when such an error is raised.
 */
export abstract class ValidationError extends LocalTlsError {}

/** Key size or DH prime size is below the configured minimum. */
export class WeakParameterError extends ValidationError {}

/** Key size, curve or DH group that the toolkit does not know. */
export class UnsupportedAlgorithmError extends ValidationError {}

export class InvalidSubjectError extends ValidationError {}

export class InvalidSubjectAltNameError extends ValidationError {}

export class InvalidValidityError extends ValidationError {}

/**
 * The certificate has a common name but no Subject Alternative Name.
 * Modern clients ignore the common name, so such a request is refused
 * unless `allowMissingSubjectAltName` is set.
 */
export class MissingSubjectAltNameError extends ValidationError {}

export class UnknownTemplateError extends ValidationError {}

export class InvalidConfigurationError extends ValidationError {}

/**
 * A file could not be written or read. `path` is the file or folder that failed.
 */
export abstract class StorageError extends LocalTlsError {
    public readonly path: string;

    constructor(message: string, path: string, options: LocalTlsErrorOptions = {}) {
        super(message, options);
        this.path = path;
    }
}

/** Permission or path layout problem (EACCES, EPERM, EROFS, ENOTDIR, EEXIST). */
export class PathUnwritableError extends StorageError {}

/** Any other write failure (disk full, I/O error, ...). */
export class ArtifactWriteError extends StorageError {}

/** An input file (certificate to inspect, existing key) cannot be read. */
export class ArtifactReadError extends StorageError {}

/** Wraps an error raised by the underlying crypto libraries. */
export class CryptoLibraryError extends LocalTlsError {}

const unwritableCodes = ["EACCES", "EPERM", "EROFS", "ENOTDIR", "EEXIST", "EISDIR"];

function errorCode(err: Error): string | undefined {
    const code: unknown = Reflect.get(err, "code");
    return typeof code === "string" ? code : undefined;
}

/**
 * turn a file system error into the matching StorageError.
 * StorageErrors are returned unchanged.
 */
export function toStorageError(err: unknown, path: string): StorageError {
    if (err instanceof StorageError) {
        return err;
    }
    const cause = err instanceof Error ? err : new Error(String(err));
    const code = errorCode(cause);
    if (code && unwritableCodes.includes(code)) {
        return new PathUnwritableError(`cannot write to ${path}`, path, { cause });
    }
    return new ArtifactWriteError(`failed to write ${path}`, path, { cause });
}

/**
 * run an operation of the crypto libraries and wrap whatever it throws.
 * LocalTlsErrors raised on the way pass through unchanged.
 */
export async function withCryptoLibrary<T>(operation: string, action: () => Promise<T>): Promise<T> {
    try {
        return await action();
    } catch (err) {
        if (err instanceof LocalTlsError) {
            throw err;
        }
        const cause = err instanceof Error ? err : new Error(String(err));
        throw new CryptoLibraryError(`${operation} failed`, { cause });
    }
}
