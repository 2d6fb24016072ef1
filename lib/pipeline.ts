// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import fs from "node:fs";
import chalk from "chalk";

import {
    type CertificateRequest,
    type IssuedCertificate,
    type ResolvedCertificateRequest,
    CertificateBuilder,
} from "./certificate/certificate_builder";
import { type DhParameters, checkDhBits, generateDhParameters, getWellKnownDhParameters } from "./dh/dh_parameters";
import { ArtifactReadError, UnknownTemplateError } from "./errors";
import { type KeyPair, type KeySpec, KeyGenerator, describeKeyPair } from "./keys/key_generator";
import { checkServerName } from "./misc/subject_alt_names";
import { type RenderedConfig, ConfigRenderer, isTemplateId, templateIds } from "./render/config_renderer";
import { type ArtifactFileNames, type ArtifactPaths, ParameterStore } from "./store/parameter_store";
import type { Filename } from "./toolbox/common";
import { makePath } from "./toolbox/common2";
import { g_config } from "./toolbox/config";
import { display, displaySubtitle, displayTitle } from "./toolbox/display";

export type DhOptions = { group: string } | { bits: number };

export interface KeySource {
    /** generate a new key pair */
    keySpec?: KeySpec;
    /** or reuse an existing PEM private key file */
    privateKeyFile?: Filename;
}

export interface GenerateKeyOptions extends KeySource {
    location: string;
    withPublicKey?: boolean;
    fileNames?: Partial<ArtifactFileNames>;
    keyGenerator?: KeyGenerator;
}

export interface IssueOptions extends GenerateKeyOptions, CertificateRequest {
    dhParameters?: DhOptions;
    /** configuration fragments to render, e.g. ["nginx"] */
    templates?: string[];
    /** server name used in the configuration fragments, the common name by default */
    serverName?: string;
}

export interface IssueResult {
    paths: ArtifactPaths;
    certificate: IssuedCertificate;
    dhParameters?: Pick<DhParameters, "bits" | "source">;
    configFiles: Filename[];
    renderedConfigs: RenderedConfig[];
}

function checkDhOptions(options: DhOptions): void {
    if ("group" in options) {
        // raises on an unknown group or one below the minimum size
        getWellKnownDhParameters(options.group);
    } else {
        checkDhBits(options.bits);
    }
}

export async function obtainDhParameters(options: DhOptions): Promise<DhParameters> {
    if ("group" in options) {
        return getWellKnownDhParameters(options.group);
    }
    displaySubtitle(`generating ${options.bits} bits DH parameters, this may take a while ...`);
    return await generateDhParameters({ bits: options.bits });
}

function defaultKeySpec(): KeySpec {
    return g_config.defaultAlgorithm === "rsa"
        ? { algorithm: "rsa", keySize: g_config.defaultKeySize }
        : { algorithm: "ecdsa", curve: g_config.defaultCurve };
}

async function readPrivateKeyFile(privateKeyFile: Filename): Promise<string> {
    const filename = makePath(privateKeyFile);
    try {
        return await fs.promises.readFile(filename, "utf-8");
    } catch (err) {
        throw new ArtifactReadError(`cannot read private key file ${filename}`, filename, {
            cause: err instanceof Error ? err : undefined,
        });
    }
}

/**
 * generate a new key pair, or load the existing one
 */
async function obtainKeyPair(keyGenerator: KeyGenerator, source: KeySource): Promise<KeyPair> {
    if (source.privateKeyFile) {
        return await keyGenerator.load(await readPrivateKeyFile(source.privateKeyFile));
    }
    return await keyGenerator.generate(source.keySpec ?? defaultKeySpec());
}

/**
 * Generate → Persist, for a key pair alone
 */
export async function generateKeyFiles(options: GenerateKeyOptions): Promise<ArtifactPaths> {
    const keyGenerator = options.keyGenerator ?? new KeyGenerator();
    const keySpec = options.keySpec ?? defaultKeySpec();
    keyGenerator.checkKeySpec(keySpec);

    displayTitle("Generate a private key");
    const keyPair = await keyGenerator.generate(keySpec);
    display("- algorithm     " + chalk.cyan(describeKeyPair(keyPair)));

    const store = new ParameterStore({ location: options.location, fileNames: options.fileNames });
    return await store.persist({ keyPair, withPublicKey: options.withPublicKey });
}

/**
 * Generate → Persist, for DH parameters alone
 */
export async function generateDhParamFile(
    options: DhOptions & { location: string; fileNames?: Partial<ArtifactFileNames> }
): Promise<ArtifactPaths> {
    checkDhOptions(options);
    displayTitle("Generate Diffie-Hellman parameters");
    const dhParameters = await obtainDhParameters(options);
    display("- prime size    " + chalk.cyan(dhParameters.bits.toString()) + " bits (" + dhParameters.source + ")");
    const store = new ParameterStore({ location: options.location, fileNames: options.fileNames });
    return await store.persist({ dhParameters });
}

/**
 * Generate → Build → Persist → [Render]
 *
 * Every check runs before the key is generated, and the key, the certificate
 * and the DH parameters all exist in memory before the first file is written.
 */
export async function issueSelfSignedCertificate(options: IssueOptions): Promise<IssueResult> {
    const keyGenerator = options.keyGenerator ?? new KeyGenerator();
    const builder = new CertificateBuilder();
    const renderer = new ConfigRenderer();

    // ----------------------------------------------------------------------------------------- validate
    const templates = options.templates ?? [];
    for (const template of templates) {
        if (!isTemplateId(template)) {
            throw new UnknownTemplateError(`unknown template "${template}", expecting one of ${templateIds.join(",")}`);
        }
    }
    if (options.dhParameters) {
        checkDhOptions(options.dhParameters);
    }
    let keySpec: KeySpec | undefined;
    let resolved: ResolvedCertificateRequest | undefined;
    if (!options.privateKeyFile) {
        keySpec = options.keySpec ?? defaultKeySpec();
        keyGenerator.checkKeySpec(keySpec);
        resolved = builder.resolve(options, keySpec.algorithm);
    }
    if (templates.length > 0) {
        // the common name is only known after signing when an existing key is reused
        const serverName = options.serverName || resolved?.subject.commonName;
        if (serverName) {
            checkServerName(serverName);
        }
    }

    // ----------------------------------------------------------------------------------------- generate
    displayTitle("Generate a private key");
    const keyPair = await obtainKeyPair(keyGenerator, { keySpec, privateKeyFile: options.privateKeyFile });
    display("- algorithm     " + chalk.cyan(describeKeyPair(keyPair)));

    // ----------------------------------------------------------------------------------------- build
    displayTitle("Create a self-signed certificate");
    const certificate = await builder.sign(keyPair, resolved ?? builder.resolve(options, keyPair.algorithm));
    display("- subject       " + chalk.cyan(certificate.subject.commonName));
    display("- valid until   " + chalk.cyan(certificate.notAfter.toISOString()));

    const serverName = options.serverName || certificate.subject.commonName;
    if (templates.length > 0) {
        checkServerName(serverName);
    }

    const dhParameters = options.dhParameters ? await obtainDhParameters(options.dhParameters) : undefined;

    // ----------------------------------------------------------------------------------------- persist
    displayTitle("Write the files");
    const store = new ParameterStore({ location: options.location, fileNames: options.fileNames });
    const paths = await store.persist({
        // an existing key file is left untouched
        keyPair: options.privateKeyFile ? undefined : keyPair,
        withPublicKey: options.withPublicKey,
        certificate,
        dhParameters,
    });
    if (options.privateKeyFile) {
        paths.privateKeyFile = makePath(options.privateKeyFile);
    }

    // ----------------------------------------------------------------------------------------- render
    const renderedConfigs: RenderedConfig[] = [];
    const configFiles: Filename[] = [];
    for (const template of templates) {
        const rendered = renderer.render({
            template,
            serverName,
            paths: {
                certificateFile: store.certificateFile,
                privateKeyFile: paths.privateKeyFile ?? store.privateKeyFile,
                dhParamFile: paths.dhParamFile,
            },
        });
        renderedConfigs.push(rendered);
        configFiles.push(await store.writeText(rendered.outputFile, rendered.content));
    }

    return {
        paths,
        certificate,
        dhParameters: dhParameters ? { bits: dhParameters.bits, source: dhParameters.source } : undefined,
        configFiles,
        renderedConfigs,
    };
}
