// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import * as x509 from "@peculiar/x509";
import chalk from "chalk";

import { CryptoLibraryError, MissingSubjectAltNameError, withCryptoLibrary } from "../errors";
import type { KeyPair } from "../keys/key_generator";
import { type SubjectIdentity, type SubjectOptions, Subject, validateSubject } from "../misc/subject";
import {
    type SANList,
    type SubjectAltName,
    canonicalIpAddress,
    formatSubjectAltName,
    normalizeSubjectAltNames,
    sanListCoversHost,
} from "../misc/subject_alt_names";
import { type CurveName, type KeyAlgorithm, type ValidityWindow, computeValidityWindow } from "../toolbox/common";
import { debugLog, warningLog } from "../toolbox/debug";

x509.cryptoProvider.set(crypto);

export type KeyUsageFlag =
    | "digitalSignature"
    | "nonRepudiation"
    | "keyEncipherment"
    | "dataEncipherment"
    | "keyAgreement"
    | "encipherOnly"
    | "decipherOnly";

export type ExtendedKeyUsageName = "serverAuth" | "clientAuth";

const extendedKeyUsageOids: Record<ExtendedKeyUsageName, string> = {
    serverAuth: x509.ExtendedKeyUsage.serverAuth,
    clientAuth: x509.ExtendedKeyUsage.clientAuth,
};

export interface CertificateRequest {
    /** the subject, or an openssl subject line such as `/O=Acme/CN=localhost` */
    subject: SubjectOptions | string;
    sanList: SubjectAltName[];
    validityDays: number;
    /** defaults to digitalSignature + keyEncipherment for RSA keys, digitalSignature for ECDSA keys */
    keyUsageFlags?: Iterable<KeyUsageFlag>;
    /** defaults to serverAuth */
    extendedKeyUsages?: Iterable<ExtendedKeyUsageName>;
    /** start of the validity window, now by default */
    notBefore?: Date;
    /** accept a certificate without Subject Alternative Name */
    allowMissingSubjectAltName?: boolean;
}

export interface ResolvedCertificateRequest extends ValidityWindow {
    subject: SubjectIdentity;
    sanList: SANList;
    keyUsageFlags: KeyUsageFlag[];
    extendedKeyUsages: ExtendedKeyUsageName[];
}

export interface IssuedCertificate extends ValidityWindow {
    /** hexadecimal, lower case */
    serialNumber: string;
    subject: SubjectIdentity;
    sanList: SANList;
    keyUsageFlags: KeyUsageFlag[];
    pem: string;
    der: Uint8Array;
}

/** what can be read back from a certificate file */
export interface CertificateSummary extends ValidityWindow {
    serialNumber: string;
    subject: SubjectOptions;
    issuer: string;
    sanList: SANList;
    isCA: boolean;
    keyUsage: number;
}

const defaultExtendedKeyUsages: ExtendedKeyUsageName[] = ["serverAuth"];

function defaultKeyUsageFlags(algorithm: KeyAlgorithm): KeyUsageFlag[] {
    return algorithm === "rsa" ? ["digitalSignature", "keyEncipherment"] : ["digitalSignature"];
}

function ecdsaHash(curve: CurveName): string {
    switch (curve) {
        case "P-256":
            return "SHA-256";
        case "P-384":
            return "SHA-384";
        case "P-521":
            return "SHA-512";
    }
}

function signingAlgorithm(keyPair: KeyPair): EcdsaParams | Algorithm {
    if (keyPair.algorithm === "rsa") {
        return { name: "RSASSA-PKCS1-v1_5" };
    }
    return { name: "ECDSA", hash: ecdsaHash(keyPair.curve) };
}

/**
 * a random, positive, 128 bits serial number
 */
export function makeSerialNumber(): string {
    const bytes = crypto.getRandomValues(new Uint8Array(16));
    // keep it positive, without leading zero byte
    bytes[0] = (bytes[0] & 0x7f) | 0x40;
    return Buffer.from(bytes).toString("hex");
}

/**
 * Build and sign self-signed X.509 certificates suitable for a TLS server.
 */
export class CertificateBuilder {
    /**
     * validate a request and compute everything the certificate needs,
     * without touching any key material
     */
    public resolve(request: CertificateRequest, algorithm: KeyAlgorithm): ResolvedCertificateRequest {
        const subject = validateSubject(new Subject(request.subject));
        const { notBefore, notAfter } = computeValidityWindow(request.validityDays, request.notBefore);
        const sanList = normalizeSubjectAltNames(request.sanList);

        if (sanList.length === 0 && !request.allowMissingSubjectAltName) {
            throw new MissingSubjectAltNameError(
                `no Subject Alternative Name given for "${subject.commonName}": clients would reject the certificate`
            );
        }
        if (sanList.length > 0 && !sanListCoversHost(sanList, subject.commonName)) {
            warningLog(
                chalk.yellow("  warning: the common name ") +
                    chalk.cyan(subject.commonName) +
                    chalk.yellow(" is not listed in the Subject Alternative Names")
            );
        }
        const keyUsageFlags = [...new Set<KeyUsageFlag>(request.keyUsageFlags ?? [])];
        const extendedKeyUsages = [...new Set<ExtendedKeyUsageName>(request.extendedKeyUsages ?? defaultExtendedKeyUsages)];
        return {
            subject,
            sanList,
            notBefore,
            notAfter,
            keyUsageFlags: keyUsageFlags.length > 0 ? keyUsageFlags : defaultKeyUsageFlags(algorithm),
            extendedKeyUsages,
        };
    }

    public async build(keyPair: KeyPair, request: CertificateRequest): Promise<IssuedCertificate> {
        const resolved = this.resolve(request, keyPair.algorithm);
        return await this.sign(keyPair, resolved);
    }

    /**
     * sign an already resolved request with the key pair
     */
    public async sign(keyPair: KeyPair, resolved: ResolvedCertificateRequest): Promise<IssuedCertificate> {
        const serialNumber = makeSerialNumber();
        const usages = resolved.keyUsageFlags.reduce((flags, flag) => flags | x509.KeyUsageFlags[flag], 0);

        debugLog("signing certificate", new Subject(resolved.subject).toString(), resolved.sanList.map(formatSubjectAltName));

        const certificate = await withCryptoLibrary("certificate signature", async () => {
            const extensions: x509.Extension[] = [
                new x509.BasicConstraintsExtension(false, undefined, true),
                new x509.KeyUsagesExtension(usages, true),
                await x509.SubjectKeyIdentifierExtension.create(keyPair.publicKey),
            ];
            if (resolved.extendedKeyUsages.length > 0) {
                extensions.push(
                    new x509.ExtendedKeyUsageExtension(
                        resolved.extendedKeyUsages.map((name) => extendedKeyUsageOids[name]),
                        false
                    )
                );
            }
            if (resolved.sanList.length > 0) {
                extensions.push(
                    new x509.SubjectAlternativeNameExtension(
                        resolved.sanList.map((san) => ({ type: san.type, value: san.value })),
                        false
                    )
                );
            }
            const cert = await x509.X509CertificateGenerator.createSelfSigned({
                serialNumber,
                name: new Subject(resolved.subject).toJsonName(),
                notBefore: resolved.notBefore,
                notAfter: resolved.notAfter,
                signingAlgorithm: signingAlgorithm(keyPair),
                keys: { privateKey: keyPair.privateKey, publicKey: keyPair.publicKey },
                extensions,
            });
            if (!(await cert.verify({ signatureOnly: true }))) {
                throw new CryptoLibraryError("the signature of the new certificate cannot be verified");
            }
            return cert;
        });

        return {
            serialNumber,
            subject: resolved.subject,
            sanList: resolved.sanList,
            notBefore: resolved.notBefore,
            notAfter: resolved.notAfter,
            keyUsageFlags: resolved.keyUsageFlags,
            pem: certificate.toString("pem").replace(/\r\n/g, "\n").trimEnd() + "\n",
            der: new Uint8Array(certificate.rawData),
        };
    }
}

function firstField(name: x509.Name, field: string): string | undefined {
    const values = name.getField(field);
    return values.length > 0 ? values[0] : undefined;
}

/**
 * parse a PEM or DER certificate and extract what the builder has put in it
 */
export function readCertificateSummary(certificate: string | Uint8Array): CertificateSummary {
    let cert: x509.X509Certificate;
    try {
        cert = new x509.X509Certificate(typeof certificate === "string" ? certificate : Uint8Array.from(certificate));
    } catch (err) {
        throw new CryptoLibraryError("cannot parse certificate", { cause: err instanceof Error ? err : undefined });
    }
    const subject: SubjectOptions = {};
    const fields: [string, keyof SubjectOptions][] = [
        ["C", "country"],
        ["ST", "state"],
        ["L", "locality"],
        ["O", "organization"],
        ["OU", "organizationalUnit"],
        ["CN", "commonName"],
    ];
    for (const [shortName, longName] of fields) {
        const value = firstField(cert.subjectName, shortName);
        if (value !== undefined) {
            subject[longName] = value;
        }
    }

    const sanList: SANList = [];
    const sanExtension = cert.getExtension(x509.SubjectAlternativeNameExtension);
    if (sanExtension) {
        for (const name of sanExtension.names.toJSON()) {
            if (name.type === "dns") {
                sanList.push({ type: "dns", value: name.value });
            } else if (name.type === "ip") {
                sanList.push({ type: "ip", value: canonicalIpAddress(name.value) ?? name.value });
            }
        }
    }
    const basicConstraints = cert.getExtension(x509.BasicConstraintsExtension);
    const keyUsage = cert.getExtension(x509.KeyUsagesExtension);

    return {
        serialNumber: cert.serialNumber.toLowerCase(),
        subject,
        issuer: cert.issuer,
        sanList,
        notBefore: cert.notBefore,
        notAfter: cert.notAfter,
        isCA: basicConstraints ? basicConstraints.ca : false,
        keyUsage: keyUsage ? keyUsage.usages : 0,
    };
}
