// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import { PemConverter } from "@peculiar/x509";

export type PemTag = "PRIVATE KEY" | "PUBLIC KEY" | "CERTIFICATE" | "DH PARAMETERS";

/**
 * encode a DER structure as a PEM block: 64 column base64, LF line endings,
 * and a final line feed as openssl writes it
 */
export function toPemFile(der: ArrayBuffer | Uint8Array, tag: PemTag): string {
    const bytes = der instanceof ArrayBuffer ? new Uint8Array(der) : Uint8Array.from(der);
    const pem = PemConverter.encode(bytes, tag);
    return pem.replace(/\r\n/g, "\n").trimEnd() + "\n";
}
