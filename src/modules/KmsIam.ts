import * as gcp from "@pulumi/gcp";
import {InitConfig} from "../types/module";
import type {KmsBindingSet, KmsIamResult, KmsIamTarget} from "../types";
import {IamTargetType} from "../common/Enums";
import {General} from "../common/General";
import {getInit} from "../config";

export type KmsIamResourceNames = {
    authoritative: Record<string, string>;
    additive: Record<string, string>;
};

class KmsIam {
    private static __instance: KmsIam;
    private config: InitConfig;

    constructor() {
        this.config = getInit();
    }

    public static getInstance(): KmsIam {
        if (this.__instance == null) {
            this.__instance = new KmsIam();
        }

        return this.__instance;
    }

    /**
     * Logical name suffix per binding record. Record names start with their
     * target kind, so keyring and key resources never share a name.
     */
    resourceNames(bindings: KmsBindingSet): KmsIamResourceNames {
        return {
            authoritative: General.uniqueSlugs(Object.keys(bindings.authoritative), "IAM binding"),
            additive: General.uniqueSlugs(Object.keys(bindings.additive), "IAM member")
        };
    }

    async main(
        keyringName: string,
        keyring: gcp.kms.KeyRing,
        keys: Record<string, gcp.kms.CryptoKey>,
        bindings: KmsBindingSet
    ): Promise<KmsIamResult> {
        const names = this.resourceNames(bindings);
        const options = General.resourceOptions(this.config);
        const prefix = `${this.config.project}-${keyringName}`;
        const result: KmsIamResult = {
            keyringBindings: {},
            keyringMembers: {},
            keyBindings: {},
            keyMembers: {}
        };

        const keyIdOf = (target: Extract<KmsIamTarget, {type: IamTargetType.KEY}>) => {
            const key = keys[target.key];

            if (!key) {
                throw new Error(`Unknown key '${target.key}' in IAM bindings`);
            }

            return key.id;
        };

        /**
         * Authoritative
         */
        for (const [name, binding] of Object.entries(bindings.authoritative)) {
            const resourceName = `${prefix}-iam-${names.authoritative[name]}`;

            if (binding.target.type === IamTargetType.KEY) {
                result.keyBindings[name] = new gcp.kms.CryptoKeyIAMBinding(resourceName, {
                    cryptoKeyId: keyIdOf(binding.target),
                    role: binding.role,
                    members: binding.members
                }, options);
            } else {
                result.keyringBindings[name] = new gcp.kms.KeyRingIAMBinding(resourceName, {
                    keyRingId: keyring.id,
                    role: binding.role,
                    members: binding.members
                }, options);
            }
        }

        /**
         * Additive
         */
        for (const [name, binding] of Object.entries(bindings.additive)) {
            const resourceName = `${prefix}-iam-member-${names.additive[name]}`;

            if (binding.target.type === IamTargetType.KEY) {
                result.keyMembers[name] = new gcp.kms.CryptoKeyIAMMember(resourceName, {
                    cryptoKeyId: keyIdOf(binding.target),
                    role: binding.role,
                    member: binding.member
                }, options);
            } else {
                result.keyringMembers[name] = new gcp.kms.KeyRingIAMMember(resourceName, {
                    keyRingId: keyring.id,
                    role: binding.role,
                    member: binding.member
                }, options);
            }
        }

        console.log(`KmsIam: Declared ${Object.keys(bindings.authoritative).length} authoritative and ${Object.keys(bindings.additive).length} additive binding(s) on '${keyringName}'`);

        return result;
    }
}

export {KmsIam}
