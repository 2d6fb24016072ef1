// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import { generatePrime, getDiffieHellman } from "node:crypto";
import * as asn1js from "asn1js";

import { UnsupportedAlgorithmError, WeakParameterError, withCryptoLibrary } from "../errors";
import { toPemFile } from "../misc/pem";
import { g_config } from "../toolbox/config";
import { debugLog } from "../toolbox/debug";

/** the RFC 3526 MODP groups */
export type DhGroupName = "modp14" | "modp15" | "modp16" | "modp17" | "modp18";

export const dhGroupSizes: Record<DhGroupName, number> = {
    modp14: 2048,
    modp15: 3072,
    modp16: 4096,
    modp17: 6144,
    modp18: 8192,
};

export function isDhGroupName(name: string): name is DhGroupName {
    return Object.prototype.hasOwnProperty.call(dhGroupSizes, name);
}

export interface DhParameters {
    prime: Uint8Array;
    generator: number;
    /** size of the prime, in bits */
    bits: number;
    /** "generated", or the name of the well known group */
    source: "generated" | DhGroupName;
    /** PKCS#3 DHParameter, PEM encoded */
    pem: string;
}

export interface DhGenerationOptions {
    bits: number;
    /** smallest prime size accepted; defaults to `g_config.minDhBits` */
    minDhBits?: number;
}

function toUnsignedInteger(bytes: Uint8Array): asn1js.Integer {
    // DER integers are signed: a leading 1 bit needs a 0x00 in front of it
    const needsPadding = bytes.length > 0 && (bytes[0] & 0x80) !== 0;
    const valueHex = new Uint8Array(bytes.length + (needsPadding ? 1 : 0));
    valueHex.set(bytes, needsPadding ? 1 : 0);
    return new asn1js.Integer({ valueHex });
}

/**
 *  DHParameter ::= SEQUENCE {
 *      prime INTEGER, -- p
 *      base INTEGER,  -- g
 *  }
 */
export function encodeDhParameters(prime: Uint8Array, generator: number): string {
    const sequence = new asn1js.Sequence({
        value: [toUnsignedInteger(prime), new asn1js.Integer({ value: generator })],
    });
    return toPemFile(sequence.toBER(false), "DH PARAMETERS");
}

function bitLength(bytes: Uint8Array): number {
    let i = 0;
    while (i < bytes.length && bytes[i] === 0) {
        i++;
    }
    if (i === bytes.length) {
        return 0;
    }
    return (bytes.length - i - 1) * 8 + Math.floor(Math.log2(bytes[i])) + 1;
}

/**
 * a safe prime p = 2q + 1 with p ≡ 23 (mod 24), so that 2 is a quadratic residue
 * and generates the subgroup of order q, as `openssl dhparam` does for g = 2
 */
function generateSafePrime(bits: number): Promise<ArrayBuffer> {
    return new Promise((resolve, reject) => {
        generatePrime(bits, { safe: true, add: 24n, rem: 23n, bigint: false }, (err, prime) => {
            if (err) {
                reject(err);
            } else {
                resolve(prime);
            }
        });
    });
}

export function checkDhBits(bits: number, minDhBits: number = g_config.minDhBits): void {
    if (!Number.isInteger(bits) || bits < minDhBits) {
        throw new WeakParameterError(`DH parameters must be at least ${minDhBits} bits (got ${bits})`);
    }
}

/**
 * generate fresh DH parameters: a safe prime of the requested size and the generator 2.
 * This can take minutes for 4096 bits primes.
 */
export async function generateDhParameters(options: DhGenerationOptions): Promise<DhParameters> {
    checkDhBits(options.bits, options.minDhBits);
    debugLog("generating a safe prime of", options.bits, "bits");
    const prime = new Uint8Array(await withCryptoLibrary("DH prime generation", () => generateSafePrime(options.bits)));
    const generator = 2;
    return {
        prime,
        generator,
        bits: bitLength(prime),
        source: "generated",
        pem: encodeDhParameters(prime, generator),
    };
}

/**
 * the parameters of one of the RFC 3526 groups, available immediately
 */
export function getWellKnownDhParameters(group: string, minDhBits: number = g_config.minDhBits): DhParameters {
    if (!isDhGroupName(group)) {
        throw new UnsupportedAlgorithmError(`unknown DH group "${group}", expecting one of ${Object.keys(dhGroupSizes).join(",")}`);
    }
    if (dhGroupSizes[group] < minDhBits) {
        throw new WeakParameterError(`DH group ${group} is ${dhGroupSizes[group]} bits, below the minimum of ${minDhBits}`);
    }
    const dh = getDiffieHellman(group);
    const prime = new Uint8Array(dh.getPrime());
    const generator = dh.getGenerator().readUInt8(0);
    return {
        prime,
        generator,
        bits: bitLength(prime),
        source: group,
        pem: encodeDhParameters(prime, generator),
    };
}
