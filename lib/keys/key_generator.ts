// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import { createPrivateKey, createPublicKey, type KeyObject } from "node:crypto";

import { CryptoLibraryError, UnsupportedAlgorithmError, WeakParameterError, withCryptoLibrary } from "../errors";
import { toPemFile } from "../misc/pem";
import { type CurveName, type KeySize, isCurveName, isKeySize, supportedKeySizes } from "../toolbox/common";
import { g_config } from "../toolbox/config";
import { debugLog } from "../toolbox/debug";

export interface RsaKeySpec {
    algorithm: "rsa";
    keySize: number;
}

export interface EcdsaKeySpec {
    algorithm: "ecdsa";
    curve: string;
}

export type KeySpec = RsaKeySpec | EcdsaKeySpec;

export interface RsaKeyPair {
    algorithm: "rsa";
    keySize: KeySize;
    privateKey: CryptoKey;
    publicKey: CryptoKey;
}

export interface EcdsaKeyPair {
    algorithm: "ecdsa";
    curve: CurveName;
    privateKey: CryptoKey;
    publicKey: CryptoKey;
}

export type KeyPair = RsaKeyPair | EcdsaKeyPair;

export interface KeyPolicy {
    /** smallest RSA modulus accepted; defaults to `g_config.minRsaKeySize` */
    minRsaKeySize?: number;
}

const keyUsages: KeyUsage[] = ["sign", "verify"];

function rsaAlgorithm(keySize: KeySize): RsaHashedKeyGenParams {
    return {
        name: "RSASSA-PKCS1-v1_5",
        modulusLength: keySize,
        publicExponent: new Uint8Array([0x01, 0x00, 0x01]),
        hash: "SHA-256",
    };
}

function ecdsaAlgorithm(curve: CurveName): EcKeyGenParams {
    return { name: "ECDSA", namedCurve: curve };
}

// names used by openssl for the curves we support
const opensslCurveNames: Record<string, CurveName> = {
    prime256v1: "P-256",
    secp384r1: "P-384",
    secp521r1: "P-521",
};

export function describeKeyPair(keyPair: KeyPair): string {
    return keyPair.algorithm === "rsa" ? `RSA ${keyPair.keySize}` : `ECDSA ${keyPair.curve}`;
}

/**
 * Produce RSA or ECDSA key pairs.
 *
 * The key material stays in memory: writing it is the job of the ParameterStore.
 */
export class KeyGenerator {
    readonly #policy: KeyPolicy;

    constructor(policy: KeyPolicy = {}) {
        this.#policy = policy;
    }

    public get minRsaKeySize(): number {
        return this.#policy.minRsaKeySize ?? g_config.minRsaKeySize;
    }

    public checkRsaKeySize(keySize: number): KeySize {
        if (!Number.isInteger(keySize) || keySize < this.minRsaKeySize) {
            throw new WeakParameterError(`RSA key size must be at least ${this.minRsaKeySize} bits (got ${keySize})`);
        }
        if (!isKeySize(keySize)) {
            throw new UnsupportedAlgorithmError(
                `unsupported RSA key size ${keySize}, expecting one of ${supportedKeySizes.join(",")}`
            );
        }
        return keySize;
    }

    public checkCurve(curve: string): CurveName {
        if (!isCurveName(curve)) {
            throw new UnsupportedAlgorithmError(`unsupported elliptic curve "${curve}", expecting P-256, P-384 or P-521`);
        }
        return curve;
    }

    /**
     * verify that a key spec is acceptable, without generating anything
     */
    public checkKeySpec(spec: KeySpec): void {
        if (spec.algorithm === "rsa") {
            this.checkRsaKeySize(spec.keySize);
        } else {
            this.checkCurve(spec.curve);
        }
    }

    public async generate(spec: KeySpec): Promise<KeyPair> {
        if (spec.algorithm === "rsa") {
            const keySize = this.checkRsaKeySize(spec.keySize);
            debugLog("generating RSA key pair", keySize);
            const { privateKey, publicKey } = await withCryptoLibrary("RSA key generation", () =>
                crypto.subtle.generateKey(rsaAlgorithm(keySize), true, keyUsages)
            );
            return { algorithm: "rsa", keySize, privateKey, publicKey };
        }
        const curve = this.checkCurve(spec.curve);
        debugLog("generating ECDSA key pair", curve);
        const { privateKey, publicKey } = await withCryptoLibrary("ECDSA key generation", () =>
            crypto.subtle.generateKey(ecdsaAlgorithm(curve), true, keyUsages)
        );
        return { algorithm: "ecdsa", curve, privateKey, publicKey };
    }

    /**
     * import an existing PEM private key (PKCS#8, PKCS#1 or SEC1),
     * so that a new certificate can be issued for it
     */
    public async load(privateKeyPem: string): Promise<KeyPair> {
        let keyObject: KeyObject;
        try {
            keyObject = createPrivateKey(privateKeyPem);
        } catch (err) {
            throw new CryptoLibraryError("cannot read private key", { cause: err instanceof Error ? err : undefined });
        }
        const details = keyObject.asymmetricKeyDetails || {};

        const pkcs8 = new Uint8Array(keyObject.export({ type: "pkcs8", format: "der" }));
        const spki = new Uint8Array(createPublicKey(keyObject).export({ type: "spki", format: "der" }));

        if (keyObject.asymmetricKeyType === "rsa") {
            const keySize = this.checkRsaKeySize(details.modulusLength ?? 0);
            const algorithm = rsaAlgorithm(keySize);
            return await withCryptoLibrary<KeyPair>("RSA key import", async () => ({
                algorithm: "rsa",
                keySize,
                privateKey: await crypto.subtle.importKey("pkcs8", pkcs8, algorithm, true, ["sign"]),
                publicKey: await crypto.subtle.importKey("spki", spki, algorithm, true, ["verify"]),
            }));
        }
        if (keyObject.asymmetricKeyType === "ec") {
            const namedCurve = details.namedCurve ?? "";
            const curve = this.checkCurve(opensslCurveNames[namedCurve] ?? namedCurve);
            const algorithm = ecdsaAlgorithm(curve);
            return await withCryptoLibrary<KeyPair>("ECDSA key import", async () => ({
                algorithm: "ecdsa",
                curve,
                privateKey: await crypto.subtle.importKey("pkcs8", pkcs8, algorithm, true, ["sign"]),
                publicKey: await crypto.subtle.importKey("spki", spki, algorithm, true, ["verify"]),
            }));
        }
        throw new UnsupportedAlgorithmError(`unsupported private key type ${keyObject.asymmetricKeyType}`);
    }
}

export async function exportPrivateKeyPem(keyPair: KeyPair): Promise<string> {
    const der = await withCryptoLibrary("private key export", () => crypto.subtle.exportKey("pkcs8", keyPair.privateKey));
    return toPemFile(der, "PRIVATE KEY");
}

export async function exportPublicKeyPem(keyPair: KeyPair): Promise<string> {
    const der = await withCryptoLibrary("public key export", () => crypto.subtle.exportKey("spki", keyPair.publicKey));
    return toPemFile(der, "PUBLIC KEY");
}
