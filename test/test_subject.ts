import should from "should";

import { InvalidSubjectError, Subject, validateSubject } from "../lib";
import { catchErrorSync } from "./helpers";

describe("Subject", () => {
    it("should compose a subject with common name only", () => {
        const subject = new Subject({ commonName: "Hello" });
        subject.toStringWithoutSlash().should.eql("CN=Hello");
        subject.toString().should.eql("/CN=Hello");
    });

    it("should compose a subject with a subject string - starting with a / (like in OpenSSL)", () => {
        const subject = new Subject("/CN=Hello");
        subject.toStringWithoutSlash().should.eql("CN=Hello");
        subject.toString().should.eql("/CN=Hello");
    });

    it("should compose a subject with a subject string - starting without a /", () => {
        const subject = new Subject("CN=Hello");
        subject.toString().should.eql("/CN=Hello");
    });

    it("should parse a subject line", () => {
        const subject = Subject.parse("/C=FR/ST=IDF/L=Paris/O=Acme Widgets/CN=localhost");
        subject.should.eql({
            country: "FR",
            state: "IDF",
            locality: "Paris",
            organization: "Acme Widgets",
            commonName: "localhost",
        });
        new Subject(subject).toString().should.eql("/C=FR/ST=IDF/L=Paris/O=Acme Widgets/CN=localhost");
    });

    it("should accept lower case field names", () => {
        Subject.parse("/cn=foo/o=bar").should.eql({ commonName: "foo", organization: "bar" });
    });

    it("should parse a long CN with slashes", () => {
        const subject = Subject.parse("/CN=PC.DOMAIN.COM/path/server/O=Acme");
        subject.should.eql({ commonName: "PC.DOMAIN.COM/path/server", organization: "Acme" });
    });

    it("should keep a quoted value containing a slash", () => {
        const subject = new Subject('/O="Acme/Widgets"/CN=x');
        should(subject.organization).eql("Acme/Widgets");
        subject.toString().should.eql('/O="Acme/Widgets"/CN=x');
    });

    it("should reject an unknown field", () => {
        const err = catchErrorSync(() => Subject.parse("/DC=MYDOMAIN/CN=Hello"));
        should(err).be.instanceOf(InvalidSubjectError);
    });

    it("should reject an element with two equal signs", () => {
        const err = catchErrorSync(() => Subject.parse("/CN=a=b"));
        should(err).be.instanceOf(InvalidSubjectError);
    });

    it("should enclose data that contains special character = with quote", () => {
        const subject = new Subject({ commonName: "Hello=Hallo" });
        subject.toString().should.eql('/CN="Hello=Hallo"');
    });

    it("should enclose data that contains special character / with quote", () => {
        const subject = new Subject({ commonName: "Hello/Hallo" });
        subject.toString().should.eql('/CN="Hello/Hallo"');
    });

    it("should replace unwanted quote character with a substitute character", () => {
        const subject = new Subject({ commonName: 'Hello"Hallo"' });
        should(subject.commonName).eql('Hello"Hallo"');
        subject.toString().should.eql("/CN=Hello”Hallo”");
    });

    it("should produce one relative distinguished name per field, in openssl order", () => {
        const subject = new Subject({ commonName: "localhost", organization: "Acme", country: "FR" });
        subject.toJsonName().should.eql([{ C: ["FR"] }, { O: ["Acme"] }, { CN: ["localhost"] }]);
    });

    describe("validateSubject", () => {
        it("should trim the common name", () => {
            validateSubject({ commonName: "  localhost " }).should.eql({ commonName: "localhost" });
        });

        it("should ignore an empty country", () => {
            validateSubject({ commonName: "x", country: "" }).should.eql({ commonName: "x" });
        });

        it("should reject a missing or blank common name", () => {
            should(catchErrorSync(() => validateSubject({ organization: "Acme" }))).be.instanceOf(InvalidSubjectError);
            should(catchErrorSync(() => validateSubject({ commonName: "   " }))).be.instanceOf(InvalidSubjectError);
        });

        it("should reject a country that is not a two letter code", () => {
            const err = catchErrorSync(() => validateSubject({ commonName: "x", country: "FRA" }));
            should(err).be.instanceOf(InvalidSubjectError);
        });
    });
});
