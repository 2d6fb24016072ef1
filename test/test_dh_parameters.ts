import { checkPrimeSync, getDiffieHellman } from "node:crypto";
import * as asn1js from "asn1js";
import should from "should";

import {
    UnsupportedAlgorithmError,
    WeakParameterError,
    encodeDhParameters,
    generateDhParameters,
    getWellKnownDhParameters,
    isDhGroupName,
} from "../lib";
import { beforeTest, catchError, catchErrorSync } from "./helpers";

function pemToDer(pem: string): Uint8Array {
    const body = pem
        .split("\n")
        .filter((line) => line.length > 0 && !line.startsWith("-----"))
        .join("");
    return new Uint8Array(Buffer.from(body, "base64"));
}

function decodeDhParameters(pem: string): { prime: Buffer; generator: number } {
    const asn = asn1js.fromBER(pemToDer(pem));
    asn.offset.should.not.eql(-1);
    if (!(asn.result instanceof asn1js.Sequence)) {
        throw new Error("expecting a sequence");
    }
    const [prime, generator] = asn.result.valueBlock.value;
    if (!(prime instanceof asn1js.Integer) || !(generator instanceof asn1js.Integer)) {
        throw new Error("expecting two integers");
    }
    return { prime: Buffer.from(prime.valueBlock.valueHexView), generator: generator.valueBlock.valueDec };
}

function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
    let result = 1n;
    let b = base % modulus;
    for (let e = exponent; e > 0n; e >>= 1n) {
        if (e & 1n) {
            result = (result * b) % modulus;
        }
        b = (b * b) % modulus;
    }
    return result;
}

describe("Diffie-Hellman parameters", function (this: Mocha.Suite) {
    beforeTest(this);

    it("should encode a DHParameter structure", () => {
        encodeDhParameters(Uint8Array.of(0x17), 2).should.eql(
            "-----BEGIN DH PARAMETERS-----\nMAYCARcCAQI=\n-----END DH PARAMETERS-----\n"
        );
    });

    it("should keep the prime positive when its high bit is set", () => {
        encodeDhParameters(Uint8Array.of(0x83), 2).should.eql(
            "-----BEGIN DH PARAMETERS-----\nMAcCAgCDAgEC\n-----END DH PARAMETERS-----\n"
        );
    });

    it("should provide the RFC 3526 2048 bits group", () => {
        const dhParameters = getWellKnownDhParameters("modp14");
        dhParameters.bits.should.eql(2048);
        dhParameters.generator.should.eql(2);
        dhParameters.source.should.eql("modp14");

        const expectedPrime = getDiffieHellman("modp14").getPrime();
        Buffer.from(dhParameters.prime).equals(expectedPrime).should.eql(true);

        const lines = dhParameters.pem.split("\n");
        lines[0].should.eql("-----BEGIN DH PARAMETERS-----");
        lines[1].should.startWith("MIIBCAKCAQEA");
        pemToDer(dhParameters.pem).length.should.eql(268);

        const decoded = decodeDhParameters(dhParameters.pem);
        decoded.prime[0].should.eql(0);
        decoded.prime.subarray(1).equals(expectedPrime).should.eql(true);
        decoded.generator.should.eql(2);
    });

    it("should know the names of the groups", () => {
        isDhGroupName("modp18").should.eql(true);
        isDhGroupName("modp2").should.eql(false);
        getWellKnownDhParameters("modp15").bits.should.eql(3072);
    });

    it("should refuse an unknown group", () => {
        should(catchErrorSync(() => getWellKnownDhParameters("modp1"))).be.instanceOf(UnsupportedAlgorithmError);
    });

    it("should refuse a group below the minimum size", () => {
        should(catchErrorSync(() => getWellKnownDhParameters("modp14", 3072))).be.instanceOf(WeakParameterError);
    });

    it("should refuse to generate parameters below the minimum size", async () => {
        should(await catchError(generateDhParameters({ bits: 1024 }))).be.instanceOf(WeakParameterError);
    });

    it("should generate a safe prime", async () => {
        const dhParameters = await generateDhParameters({ bits: 256, minDhBits: 256 });
        dhParameters.bits.should.eql(256);
        dhParameters.generator.should.eql(2);
        dhParameters.source.should.eql("generated");

        const p = BigInt("0x" + Buffer.from(dhParameters.prime).toString("hex"));
        checkPrimeSync(p).should.eql(true);
        checkPrimeSync((p - 1n) / 2n).should.eql(true);

        const decoded = decodeDhParameters(dhParameters.pem);
        decoded.prime.toString("hex").replace(/^00/, "").should.eql(Buffer.from(dhParameters.prime).toString("hex"));
        decoded.generator.should.eql(2);
    });

    it("should pick primes for which 2 generates the subgroup of order q", async () => {
        for (let i = 0; i < 8; i++) {
            const dhParameters = await generateDhParameters({ bits: 256, minDhBits: 256 });
            const p = BigInt("0x" + Buffer.from(dhParameters.prime).toString("hex"));
            (p % 24n === 23n).should.eql(true);
            // Euler's criterion: 2 is a quadratic residue modulo p
            (modPow(2n, (p - 1n) / 2n, p) === 1n).should.eql(true);
        }
    });
});
