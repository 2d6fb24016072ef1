// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import { createHash, randomBytes } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { withLock } from "@ster5/global-mutex";
import chalk from "chalk";

import type { IssuedCertificate } from "../certificate/certificate_builder";
import type { DhParameters } from "../dh/dh_parameters";
import { toStorageError } from "../errors";
import { type KeyPair, exportPrivateKeyPem, exportPublicKeyPem } from "../keys/key_generator";
import type { Filename } from "../toolbox/common";
import { makePath, mkdirRecursive } from "../toolbox/common2";
import { debugLog } from "../toolbox/debug";
import { display } from "../toolbox/display";

/** owner read/write */
export const PRIVATE_FILE_MODE = 0o600;
/** owner read/write, others read */
export const PUBLIC_FILE_MODE = 0o644;

export interface ArtifactFileNames {
    privateKey: string;
    certificate: string;
    dhParameters: string;
    publicKey: string;
}

export const defaultArtifactFileNames: Readonly<ArtifactFileNames> = Object.freeze({
    privateKey: "private_key.pem",
    certificate: "certificate.pem",
    dhParameters: "dhparam.pem",
    publicKey: "public_key.pem",
});

export interface ArtifactPaths {
    privateKeyFile?: Filename;
    certificateFile?: Filename;
    dhParamFile?: Filename;
    publicKeyFile?: Filename;
}

export interface ParameterStoreOptions {
    /** the destination folder, created when missing */
    location: string;
    fileNames?: Partial<ArtifactFileNames>;
}

export interface PersistOptions {
    keyPair?: KeyPair;
    certificate?: IssuedCertificate;
    dhParameters?: DhParameters;
    /** also write the public key of `keyPair` */
    withPublicKey?: boolean;
}

/**
 * the mutex guarding a target file; it lives in the temporary folder
 * so that the output folder only ever holds the artifacts
 */
export function mutexFileFor(filename: Filename): string {
    const hash = createHash("sha1").update(path.resolve(filename)).digest("hex").substring(0, 16);
    return path.join(os.tmpdir(), `localtls-${hash}.mutex`);
}

/**
 * write `data` to `filename` with the given permission bits.
 *
 * The data goes to a temporary file of the same folder first, which is then
 * renamed over the target: readers see either the previous file or the new one.
 * Writers of the same file are serialized by a lock on that file.
 */
export async function atomicWriteFile(filename: Filename, data: string, mode: number): Promise<void> {
    const tmpFile = path.join(path.dirname(filename), `.${path.basename(filename)}.${randomBytes(6).toString("hex")}.tmp`);
    try {
        await withLock<void>({ fileToLock: mutexFileFor(filename) }, async () => {
            try {
                await fs.promises.writeFile(tmpFile, data, { encoding: "utf-8", mode, flag: "wx" });
                // the mode given to writeFile is filtered by the umask
                await fs.promises.chmod(tmpFile, mode);
                await fs.promises.rename(tmpFile, filename);
            } catch (err) {
                await fs.promises.rm(tmpFile, { force: true });
                throw err;
            }
        });
    } catch (err) {
        throw toStorageError(err, filename);
    }
    debugLog(chalk.white(" .. written "), filename, mode.toString(8));
}

/**
 * Persist keys, certificates and DH parameters in a folder,
 * each with the permission bits it deserves.
 */
export class ParameterStore {
    public readonly location: string;
    public readonly fileNames: ArtifactFileNames;

    constructor(options: ParameterStoreOptions) {
        this.location = makePath(options.location);
        this.fileNames = { ...defaultArtifactFileNames, ...options.fileNames };
    }

    public get privateKeyFile(): Filename {
        return makePath(this.location, this.fileNames.privateKey);
    }

    public get certificateFile(): Filename {
        return makePath(this.location, this.fileNames.certificate);
    }

    public get dhParamFile(): Filename {
        return makePath(this.location, this.fileNames.dhParameters);
    }

    public get publicKeyFile(): Filename {
        return makePath(this.location, this.fileNames.publicKey);
    }

    public async initialize(): Promise<void> {
        await mkdirRecursive(this.location);
    }

    public async writePrivateKey(keyPair: KeyPair): Promise<Filename> {
        const pem = await exportPrivateKeyPem(keyPair);
        await this.initialize();
        await atomicWriteFile(this.privateKeyFile, pem, PRIVATE_FILE_MODE);
        display("- private key   " + chalk.cyan(this.privateKeyFile));
        return this.privateKeyFile;
    }

    public async writePublicKey(keyPair: KeyPair): Promise<Filename> {
        const pem = await exportPublicKeyPem(keyPair);
        await this.initialize();
        await atomicWriteFile(this.publicKeyFile, pem, PUBLIC_FILE_MODE);
        display("- public key    " + chalk.cyan(this.publicKeyFile));
        return this.publicKeyFile;
    }

    public async writeCertificate(certificate: IssuedCertificate): Promise<Filename> {
        await this.initialize();
        await atomicWriteFile(this.certificateFile, certificate.pem, PUBLIC_FILE_MODE);
        display("- certificate   " + chalk.cyan(this.certificateFile));
        return this.certificateFile;
    }

    public async writeDhParameters(dhParameters: DhParameters): Promise<Filename> {
        await this.initialize();
        await atomicWriteFile(this.dhParamFile, dhParameters.pem, PUBLIC_FILE_MODE);
        display("- dh parameters " + chalk.cyan(this.dhParamFile));
        return this.dhParamFile;
    }

    /**
     * write a text file next to the artifacts (a rendered configuration for instance)
     */
    public async writeText(filename: string, content: string): Promise<Filename> {
        const target = makePath(this.location, filename);
        await this.initialize();
        await atomicWriteFile(target, content, PUBLIC_FILE_MODE);
        display("- file          " + chalk.cyan(target));
        return target;
    }

    /**
     * write every artifact provided, in order: key, public key, certificate, DH parameters.
     * A failure stops the sequence; files already written stay in place.
     *
     * Calls on the same folder run one after the other, so the key and the
     * certificate left in the folder always come from the same call.
     */
    public async persist(options: PersistOptions): Promise<ArtifactPaths> {
        try {
            return await withLock<ArtifactPaths>({ fileToLock: mutexFileFor(this.location) }, async () => {
                const paths: ArtifactPaths = {};
                if (options.keyPair) {
                    paths.privateKeyFile = await this.writePrivateKey(options.keyPair);
                    if (options.withPublicKey) {
                        paths.publicKeyFile = await this.writePublicKey(options.keyPair);
                    }
                }
                if (options.certificate) {
                    paths.certificateFile = await this.writeCertificate(options.certificate);
                }
                if (options.dhParameters) {
                    paths.dhParamFile = await this.writeDhParameters(options.dhParameters);
                }
                return paths;
            });
        } catch (err) {
            throw toStorageError(err, this.location);
        }
    }
}
