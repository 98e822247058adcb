import {afterEach, describe, expect, it, vi} from "vitest";
import {UtilsIam} from "./UtilsIam";
import {General} from "./General";
import {IamTargetType} from "./Enums";

const KEYRING = {type: IamTargetType.KEYRING} as const;

describe("UtilsIam.authoritativeBindings", () => {
    it("emits one record per role with deduplicated members", () => {
        const result = UtilsIam.authoritativeBindings(KEYRING, {
            "roles/cloudkms.admin": ["user:a@example.com", "user:b@example.com", "user:a@example.com"],
        });

        expect(result).toEqual({
            "keyring/roles/cloudkms.admin": {
                target: KEYRING,
                role: "roles/cloudkms.admin",
                members: ["user:a@example.com", "user:b@example.com"],
            },
        });
    });

    it("names key records after the key and role", () => {
        const result = UtilsIam.authoritativeBindings(UtilsIam.keyTarget("key-a"), {
            "roles/cloudkms.viewer": ["group:ops@example.com"],
        });

        expect(Object.keys(result)).toEqual(["key:key-a/roles/cloudkms.viewer"]);
        expect(result["key:key-a/roles/cloudkms.viewer"].target).toEqual({type: IamTargetType.KEY, key: "key-a"});
    });

    it("keeps a role with an empty member list", () => {
        const result = UtilsIam.authoritativeBindings(KEYRING, {"roles/cloudkms.admin": []});

        expect(result["keyring/roles/cloudkms.admin"].members).toEqual([]);
    });
});

describe("UtilsIam.additiveBindings", () => {
    it("flattens role -> members into one record per member", () => {
        const result = UtilsIam.additiveBindings(KEYRING, {
            "roles/cloudkms.cryptoKeyEncrypter": ["user:a@example.com", "user:b@example.com"],
        });

        expect(Object.keys(result)).toEqual([
            "keyring/roles/cloudkms.cryptoKeyEncrypter/user:a@example.com",
            "keyring/roles/cloudkms.cryptoKeyEncrypter/user:b@example.com",
        ]);
        expect(result["keyring/roles/cloudkms.cryptoKeyEncrypter/user:b@example.com"]).toEqual({
            target: KEYRING,
            role: "roles/cloudkms.cryptoKeyEncrypter",
            member: "user:b@example.com",
        });
    });

    it("returns nothing for a missing map", () => {
        expect(UtilsIam.additiveBindings(KEYRING)).toEqual({});
    });
});

describe("UtilsIam.individualBindings", () => {
    it("prefixes the caller key with the target kind", () => {
        const result = UtilsIam.individualBindings({
            "ring-reader": {member: "user:a@example.com", role: "roles/cloudkms.viewer"},
            "key-a-signer": {key: "key-a", member: "user:b@example.com", role: "roles/cloudkms.signer"},
        });

        expect(Object.keys(result)).toEqual(["ring-binding:ring-reader", "key-binding:key-a-signer"]);
        expect(result["ring-binding:ring-reader"].target).toEqual(KEYRING);
        expect(result["key-binding:key-a-signer"].target).toEqual({type: IamTargetType.KEY, key: "key-a"});
        expect(result["key-binding:key-a-signer"].member).toBe("user:b@example.com");
    });
});

describe("UtilsIam.mergeBindings", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("drops additive grants on a role managed authoritatively and warns", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

        const result = UtilsIam.mergeBindings(
            [UtilsIam.authoritativeBindings(KEYRING, {"roles/cloudkms.admin": ["user:a@example.com"]})],
            [
                UtilsIam.additiveBindings(KEYRING, {
                    "roles/cloudkms.admin": ["user:b@example.com"],
                    "roles/cloudkms.viewer": ["user:b@example.com"],
                }),
                UtilsIam.individualBindings({
                    extra: {member: "user:c@example.com", role: "roles/cloudkms.admin"},
                }),
            ]
        );

        expect(result.authoritative["keyring/roles/cloudkms.admin"].members).toEqual(["user:a@example.com"]);
        expect(Object.keys(result.additive)).toEqual(["keyring/roles/cloudkms.viewer/user:b@example.com"]);
        expect(warn).toHaveBeenCalledTimes(2);
        expect(warn).toHaveBeenCalledWith(
            "KmsIam: Dropping additive grant 'ring-binding:extra' (user:c@example.com), keyring/roles/cloudkms.admin is managed authoritatively"
        );
    });

    it("does not let a keyring role shadow the same role on a key", () => {
        const result = UtilsIam.mergeBindings(
            [UtilsIam.authoritativeBindings(KEYRING, {"roles/cloudkms.admin": ["user:a@example.com"]})],
            [UtilsIam.additiveBindings(UtilsIam.keyTarget("key-a"), {"roles/cloudkms.admin": ["user:b@example.com"]})]
        );

        expect(Object.keys(result.additive)).toEqual(["key:key-a/roles/cloudkms.admin/user:b@example.com"]);
    });

    it("collapses the same triple from several additive sources to the first", () => {
        const result = UtilsIam.mergeBindings([], [
            UtilsIam.additiveBindings(KEYRING, {"roles/cloudkms.viewer": ["user:a@example.com"]}),
            UtilsIam.individualBindings({dup: {member: "user:a@example.com", role: "roles/cloudkms.viewer"}}),
        ]);

        expect(Object.keys(result.additive)).toEqual(["keyring/roles/cloudkms.viewer/user:a@example.com"]);
    });
});

describe("UtilsIam.assemble", () => {
    it("combines all six inputs", () => {
        const result = UtilsIam.assemble({
            iam: {"roles/cloudkms.admin": ["user:admin@example.com"]},
            iamAdditive: {"roles/cloudkms.viewer": ["user:viewer@example.com"]},
            iamBindingsAdditive: {
                auditor: {member: "group:audit@example.com", role: "roles/cloudkms.viewer"},
            },
            keyIam: {"key-a": {"roles/cloudkms.cryptoKeyEncrypterDecrypter": ["serviceAccount:app@p.iam.gserviceaccount.com"]}},
            keyIamAdditive: {"key-b": {"roles/cloudkms.signer": ["user:signer@example.com"]}},
            keyIamBindingsAdditive: {
                "key-b-verifier": {key: "key-b", member: "user:verifier@example.com", role: "roles/cloudkms.signerVerifier"},
            },
        }, ["key-a", "key-b"]);

        expect(Object.keys(result.authoritative)).toEqual([
            "keyring/roles/cloudkms.admin",
            "key:key-a/roles/cloudkms.cryptoKeyEncrypterDecrypter",
        ]);
        expect(Object.keys(result.additive)).toEqual([
            "keyring/roles/cloudkms.viewer/user:viewer@example.com",
            "ring-binding:auditor",
            "key:key-b/roles/cloudkms.signer/user:signer@example.com",
            "key-binding:key-b-verifier",
        ]);
    });

    it("accepts the same caller key in the keyring and key grant maps", () => {
        const result = UtilsIam.assemble({
            iamBindingsAdditive: {
                viewer: {member: "user:a@example.com", role: "roles/cloudkms.viewer"},
            },
            keyIamBindingsAdditive: {
                viewer: {key: "key-a", member: "user:b@example.com", role: "roles/cloudkms.viewer"},
            },
        }, ["key-a"]);

        expect(result.additive).toEqual({
            "ring-binding:viewer": {
                target: KEYRING,
                role: "roles/cloudkms.viewer",
                member: "user:a@example.com",
            },
            "key-binding:viewer": {
                target: {type: IamTargetType.KEY, key: "key-a"},
                role: "roles/cloudkms.viewer",
                member: "user:b@example.com",
            },
        });
    });

    it("keeps a keyring role and a key role whose old flat names would coincide", () => {
        const result = UtilsIam.assemble({
            iam: {"key-a-roles/x": ["user:a@example.com"]},
            keyIam: {"key-a": {"roles/x": ["user:b@example.com"]}},
        }, ["key-a"]);

        expect(Object.keys(result.authoritative)).toEqual([
            "keyring/key-a-roles/x",
            "key:key-a/roles/x",
        ]);
        expect(result.authoritative["keyring/key-a-roles/x"].members).toEqual(["user:a@example.com"]);
        expect(result.authoritative["key:key-a/roles/x"].members).toEqual(["user:b@example.com"]);
    });

    it("fails on a key-level binding for an undeclared key", () => {
        expect(() => UtilsIam.assemble({
            keyIamBindingsAdditive: {x: {key: "missing", member: "user:a@example.com", role: "roles/cloudkms.viewer"}},
        }, ["key-a"])).toThrow("Unknown key 'missing' in keyIamBindingsAdditive");

        expect(() => UtilsIam.assemble({
            keyIam: {missing: {"roles/cloudkms.viewer": []}},
        }, [])).toThrow("Unknown key 'missing' in keyIam");
    });
});

describe("General.uniqueSlugs", () => {
    it("maps binding names to logical name fragments", () => {
        expect(General.uniqueSlugs([
            "keyring/roles/cloudkms.admin",
            "key:key-a/roles/cloudkms.admin",
            "ring-binding:viewer",
            "key-binding:viewer",
        ], "IAM binding")).toEqual({
            "keyring/roles/cloudkms.admin": "keyring-roles-cloudkms.admin",
            "key:key-a/roles/cloudkms.admin": "key-key-a-roles-cloudkms.admin",
            "ring-binding:viewer": "ring-binding-viewer",
            "key-binding:viewer": "key-binding-viewer",
        });
    });

    it("rejects two names that collapse to one fragment", () => {
        expect(() => General.uniqueSlugs(["a b", "a-b"], "Tag binding"))
            .toThrow("Tag binding names 'a b' and 'a-b' both map to resource name 'a-b'");
    });
});
