// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import { createHash } from "node:crypto";
import fs from "node:fs";
import chalk from "chalk";
import { makeSHA1Thumbprint, readCertificate } from "node-opcua-crypto";
import type { Options } from "yargs";
import yargs from "yargs/yargs";

import { type CertificateRequest, readCertificateSummary } from "../certificate/certificate_builder";
import {
    ArtifactReadError,
    CryptoLibraryError,
    LocalTlsError,
    StorageError,
    ValidationError,
    withCryptoLibrary,
} from "../errors";
import type { KeySpec } from "../keys/key_generator";
import { type SubjectOptions, Subject } from "../misc/subject";
import {
    type SubjectAltName,
    checkServerName,
    formatSubjectAltName,
    parseSubjectAltName,
    parseSubjectAltNames,
} from "../misc/subject_alt_names";
import { type DhOptions, generateDhParamFile, generateKeyFiles, issueSelfSignedCertificate } from "../pipeline";
import { ConfigRenderer, templateIds } from "../render/config_renderer";
import { ParameterStore } from "../store/parameter_store";
import type { CurveName, KeyAlgorithm } from "../toolbox/common";
import { g_config, loadConfiguration, performSubstitution, resetConfiguration } from "../toolbox/config";
import { debugLog, errorLog, warningLog } from "../toolbox/debug";
import { displayChapter } from "../toolbox/display";

const epilog = "localtls - self-signed certificates for local TLS servers";

export enum ExitCode {
    Success = 0,
    InternalFailure = 1,
    ValidationError = 2,
    IoError = 3,
    CryptoError = 4,
    Usage = 64,
}

export function exitCodeOf(err: unknown): ExitCode {
    if (err instanceof ValidationError) {
        return ExitCode.ValidationError;
    }
    if (err instanceof StorageError) {
        return ExitCode.IoError;
    }
    if (err instanceof CryptoLibraryError) {
        return ExitCode.CryptoError;
    }
    return ExitCode.InternalFailure;
}

async function wrap(func: () => Promise<void>): Promise<ExitCode> {
    try {
        await func();
        return ExitCode.Success;
    } catch (err) {
        const exitCode = exitCodeOf(err);
        errorLog(err instanceof Error ? err.message : String(err));
        if (exitCode === ExitCode.InternalFailure && !(err instanceof LocalTlsError)) {
            debugLog(err);
        }
        return exitCode;
    }
}

const commonOptions = {
    silent: { alias: "s", type: "boolean", default: false, describe: "minimize output" },
    config: { alias: "c", type: "string", describe: "a JSON file that overrides the default settings" },
    out: { alias: "o", type: "string", describe: "the output folder (default {CWD}/certificates)" },
} satisfies Record<string, Options>;

const keyOptions = {
    algorithm: { alias: "a", type: "string", choices: ["rsa", "ecdsa"] as const, describe: "the key algorithm (default rsa)" },
    "key-size": { alias: "k", type: "number", describe: "the RSA key size in bits (1024|2048|3072|4096|8192)" },
    curve: { type: "string", choices: ["P-256", "P-384", "P-521"] as const, describe: "the ECDSA curve (default P-256)" },
} satisfies Record<string, Options>;

const certificateOptions = {
    domain: { alias: "d", type: "string", describe: "the common name (default localhost, {hostname} expands)" },
    san: { type: "string", array: true, describe: "subject alternative names, comma separated (DNS:name, IP:address)" },
    ip: { type: "string", array: true, describe: "IP addresses to add to the subject alternative names" },
    "domain-san": { type: "boolean", default: true, describe: "add the domain to the subject alternative names" },
    "allow-missing-san": { type: "boolean", default: false, describe: "accept a certificate without subject alternative name" },
    subject: { type: "string", describe: "the subject, such as /C=FR/O=Acme/CN=localhost" },
    days: { alias: "v", type: "number", describe: "the validity in days (default 365)" },
    key: { type: "string", describe: "issue the certificate for this existing private key" },
} satisfies Record<string, Options>;

const dhOptions = {
    "dh-bits": { type: "number", describe: "generate DH parameters of this size (default 2048)" },
    "dh-group": {
        type: "string",
        choices: ["modp14", "modp15", "modp16", "modp17", "modp18"] as const,
        describe: "use a RFC 3526 group instead of generating parameters",
    },
} satisfies Record<string, Options>;

const templateOption = {
    template: { alias: "t", type: "string", array: true, describe: `web server configuration to render (${templateIds.join("|")})` },
} satisfies Record<string, Options>;

interface CommonArgs {
    silent: boolean;
    config?: string;
    out?: string;
}

interface KeyArgs {
    algorithm?: KeyAlgorithm;
    keySize?: number;
    curve?: CurveName;
}

interface CertificateArgs {
    domain?: string;
    san?: string[];
    ip?: string[];
    domainSan: boolean;
    allowMissingSan: boolean;
    subject?: string;
    days?: number;
}

interface DhArgs {
    dhBits?: number;
    dhGroup?: string;
}

async function readConfiguration(argv: CommonArgs): Promise<void> {
    resetConfiguration();
    if (argv.config) {
        await loadConfiguration(argv.config);
    }
    if (argv.silent) {
        g_config.silent = true;
    }
}

function outputFolder(argv: CommonArgs): string {
    return argv.out ?? g_config.outputDir;
}

function keySpecOf(argv: KeyArgs): KeySpec {
    const algorithm = argv.algorithm ?? g_config.defaultAlgorithm;
    if (algorithm === "ecdsa") {
        return { algorithm, curve: argv.curve ?? g_config.defaultCurve };
    }
    return { algorithm, keySize: argv.keySize ?? g_config.defaultKeySize };
}

function dhOptionsOf(argv: DhArgs): DhOptions {
    if (argv.dhGroup) {
        return { group: argv.dhGroup };
    }
    return { bits: argv.dhBits ?? Math.max(2048, g_config.minDhBits) };
}

function splitList(values: string[] | undefined): string[] {
    return (values ?? []).flatMap((value) => value.split(",")).map((value) => value.trim()).filter((value) => value.length > 0);
}

/**
 * the common name comes from --domain, else from the CN of --subject, else localhost
 */
export function certificateRequestOf(argv: CertificateArgs): CertificateRequest {
    const subject: SubjectOptions = argv.subject ? Subject.parse(argv.subject) : {};
    if (argv.domain) {
        subject.commonName = performSubstitution(argv.domain);
    }
    const commonName = subject.commonName ?? "localhost";
    subject.commonName = commonName;

    const sanList: SubjectAltName[] = [];
    if (argv.domainSan && commonName.trim().length > 0) {
        sanList.push(parseSubjectAltName(commonName.trim()));
    }
    sanList.push(...parseSubjectAltNames(splitList(argv.san).map(performSubstitution)));
    sanList.push(...parseSubjectAltNames(splitList(argv.ip).map((ip) => "IP:" + ip)));

    return {
        subject,
        sanList,
        validityDays: argv.days ?? g_config.defaultValidityDays,
        allowMissingSubjectAltName: argv.allowMissingSan,
    };
}

function formatFingerprint(hex: string): string {
    const pairs: string[] = [];
    for (let i = 0; i < hex.length; i += 2) {
        pairs.push(hex.substring(i, i + 2));
    }
    return pairs.join(":").toUpperCase();
}

async function inspectCertificate(certificateFile: string): Promise<void> {
    const filename = performSubstitution(certificateFile);
    try {
        await fs.promises.access(filename, fs.constants.R_OK);
    } catch (err) {
        throw new ArtifactReadError(`cannot read ${filename}`, filename, { cause: err instanceof Error ? err : undefined });
    }
    const der = await withCryptoLibrary("certificate reading", async () => readCertificate(filename));
    const summary = readCertificateSummary(der);

    displayChapter("Certificate " + filename);
    const w = (label: string, value: string) => warningLog(chalk.yellow(label.padEnd(14)), value);
    w("subject", chalk.cyan(new Subject(summary.subject).toString()));
    w("issuer", chalk.cyan(summary.issuer));
    w("serial", summary.serialNumber);
    w("not before", summary.notBefore.toISOString());
    w("not after", summary.notAfter.toISOString());
    w("alt names", summary.sanList.map(formatSubjectAltName).join(", "));
    w("SHA-1", formatFingerprint(makeSHA1Thumbprint(der).toString("hex")));
    w("SHA-256", formatFingerprint(createHash("sha256").update(der).digest("hex")));
}

async function renderConfig(argv: CommonArgs & { template: string[]; domain?: string }): Promise<void> {
    const store = new ParameterStore({ location: outputFolder(argv) });
    const renderer = new ConfigRenderer();
    const dhParamFile = fs.existsSync(store.dhParamFile) ? store.dhParamFile : undefined;
    const serverName = argv.domain ? checkServerName(performSubstitution(argv.domain)) : undefined;
    for (const template of splitList(argv.template)) {
        const rendered = renderer.render({
            template,
            serverName,
            paths: { certificateFile: store.certificateFile, privateKeyFile: store.privateKeyFile, dhParamFile },
        });
        await store.writeText(rendered.outputFile, rendered.content);
    }
}

/**
 * run the command line with the given arguments (without the node and script names)
 * and return the process exit code
 */
export async function main(args: string[]): Promise<number> {
    let exitCode: number = ExitCode.Success;

    const run = async (func: () => Promise<void>): Promise<void> => {
        exitCode = await wrap(func);
    };

    await yargs(args)
        .scriptName("localtls")
        .exitProcess(false)
        .strict()
        .wrap(132)
        .command(
            "generate-key",
            "create a private key",
            (y) =>
                y
                    .options({
                        ...commonOptions,
                        ...keyOptions,
                        "public-key": { type: "boolean", default: false, describe: "also write the public key" },
                    })
                    .example("$0 generate-key -a ecdsa --curve P-384", "create a P-384 private key"),
            async (argv) =>
                run(async () => {
                    await readConfiguration(argv);
                    await generateKeyFiles({
                        location: outputFolder(argv),
                        keySpec: keySpecOf(argv),
                        withPublicKey: argv.publicKey,
                    });
                })
        )
        .command(
            "generate-cert",
            "create a private key and a self-signed certificate",
            (y) =>
                y
                    .options({ ...commonOptions, ...keyOptions, ...certificateOptions })
                    .example("$0 generate-cert -d localhost --ip 127.0.0.1", "certificate for https://localhost"),
            async (argv) =>
                run(async () => {
                    await readConfiguration(argv);
                    await issueSelfSignedCertificate({
                        ...certificateRequestOf(argv),
                        location: outputFolder(argv),
                        keySpec: argv.key ? undefined : keySpecOf(argv),
                        privateKeyFile: argv.key,
                    });
                })
        )
        .command(
            "generate-dhparam",
            "create Diffie-Hellman parameters",
            (y) =>
                y
                    .options({ ...commonOptions, ...dhOptions })
                    .conflicts("dh-bits", "dh-group")
                    .example("$0 generate-dhparam --dh-group modp15", "use the 3072 bits group of RFC 3526"),
            async (argv) =>
                run(async () => {
                    await readConfiguration(argv);
                    await generateDhParamFile({ ...dhOptionsOf(argv), location: outputFolder(argv) });
                })
        )
        .command(
            "generate-all",
            "create a private key, a self-signed certificate and Diffie-Hellman parameters",
            (y) =>
                y
                    .options({ ...commonOptions, ...keyOptions, ...certificateOptions, ...dhOptions, ...templateOption })
                    .conflicts("dh-bits", "dh-group")
                    .example("$0 generate-all -d localhost --dh-group modp14 -t nginx", "everything an nginx server needs"),
            async (argv) =>
                run(async () => {
                    await readConfiguration(argv);
                    await issueSelfSignedCertificate({
                        ...certificateRequestOf(argv),
                        location: outputFolder(argv),
                        keySpec: argv.key ? undefined : keySpecOf(argv),
                        privateKeyFile: argv.key,
                        dhParameters: dhOptionsOf(argv),
                        templates: splitList(argv.template),
                    });
                })
        )
        .command(
            "render-config",
            "render a web server configuration for the files of the output folder",
            (y) =>
                y
                    .options({
                        ...commonOptions,
                        template: { ...templateOption.template, demandOption: true },
                        domain: certificateOptions.domain,
                    })
                    .example("$0 render-config -t nginx -t caddy", "write nginx.conf and Caddyfile"),
            async (argv) =>
                run(async () => {
                    await readConfiguration(argv);
                    await renderConfig(argv);
                })
        )
        .command(
            "inspect <certificateFile>",
            "display a certificate",
            (y) =>
                y
                    .positional("certificateFile", { type: "string", demandOption: true, describe: "a PEM or DER certificate" })
                    .options(commonOptions),
            async (argv) =>
                run(async () => {
                    await readConfiguration(argv);
                    await inspectCertificate(argv.certificateFile);
                })
        )
        .demandCommand(1, "a command is required, use --help for the list")
        .fail((msg: string | undefined, err: Error | undefined) => {
            exitCode = ExitCode.Usage;
            errorLog(msg || (err ? err.message : "invalid command line"));
            warningLog(" use --help for more info");
        })
        .epilog(epilog)
        .help("help")
        .parseAsync();

    debugLog("exit code", exitCode);
    return exitCode;
}
