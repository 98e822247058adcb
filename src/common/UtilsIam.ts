import {IamTargetType} from "./Enums";
import type {
    KmsAdditiveBinding,
    KmsAuthoritativeBinding,
    KmsBindingSet,
    KmsIamBindingAdditive,
    KmsIamConfig,
    KmsIamTarget,
    KmsKeyIamBindingAdditive,
    KmsRoleMembers
} from "../types";

const KEYRING_TARGET: KmsIamTarget = {type: IamTargetType.KEYRING};

class UtilsIam {
    static keyTarget(key: string): KmsIamTarget {
        return {type: IamTargetType.KEY, key};
    }

    /**
     * Identity of a (target, role) pair, e.g. `keyring/roles/cloudkms.admin`
     * or `key:key-a/roles/cloudkms.admin`. Key names carry no `/`.
     */
    static roleSlot(target: KmsIamTarget, role: string): string {
        return target.type === IamTargetType.KEY
            ? `key:${target.key}/${role}`
            : `keyring/${role}`;
    }

    static authoritativeBindings(
        target: KmsIamTarget,
        roleMap: KmsRoleMembers = {}
    ): Record<string, KmsAuthoritativeBinding> {
        const result: Record<string, KmsAuthoritativeBinding> = {};

        for (const [role, members] of Object.entries(roleMap)) {
            result[this.roleSlot(target, role)] = {
                target,
                role,
                members: [...new Set(members)]
            };
        }

        return result;
    }

    static additiveBindings(
        target: KmsIamTarget,
        roleMap: KmsRoleMembers = {}
    ): Record<string, KmsAdditiveBinding> {
        const result: Record<string, KmsAdditiveBinding> = {};

        for (const [role, members] of Object.entries(roleMap)) {
            for (const member of members) {
                result[`${this.roleSlot(target, role)}/${member}`] = {
                    target,
                    role,
                    member
                };
            }
        }

        return result;
    }

    /**
     * Caller keys only enumerate the records; keyring and key records live
     * under their own prefixes so the two maps may reuse a key.
     */
    static individualBindings(
        records: Record<string, KmsIamBindingAdditive | KmsKeyIamBindingAdditive> = {}
    ): Record<string, KmsAdditiveBinding> {
        const result: Record<string, KmsAdditiveBinding> = {};

        for (const [name, record] of Object.entries(records)) {
            if ("key" in record) {
                result[`key-binding:${name}`] = {
                    target: this.keyTarget(record.key),
                    role: record.role,
                    member: record.member
                };
            } else {
                result[`ring-binding:${name}`] = {
                    target: KEYRING_TARGET,
                    role: record.role,
                    member: record.member
                };
            }
        }

        return result;
    }

    /**
     * Additive sources are folded in order, authoritative roles win: an additive
     * grant on a (target, role) that has an authoritative binding is dropped.
     */
    static mergeBindings(
        authoritative: Record<string, KmsAuthoritativeBinding>[],
        additive: Record<string, KmsAdditiveBinding>[]
    ): KmsBindingSet {
        const result: KmsBindingSet = {authoritative: {}, additive: {}};
        const authoritativeSlots = new Set<string>();
        const seenTriples = new Set<string>();

        for (const source of authoritative) {
            for (const [name, binding] of Object.entries(source)) {
                result.authoritative[name] = binding;
                authoritativeSlots.add(this.roleSlot(binding.target, binding.role));
            }
        }

        for (const source of additive) {
            for (const [name, binding] of Object.entries(source)) {
                const slot = this.roleSlot(binding.target, binding.role);

                if (authoritativeSlots.has(slot)) {
                    console.warn(`KmsIam: Dropping additive grant '${name}' (${binding.member}), ${slot} is managed authoritatively`);
                    continue;
                }

                const triple = `${slot}/${binding.member}`;

                if (seenTriples.has(triple)) {
                    continue;
                }

                seenTriples.add(triple);
                result.additive[name] = binding;
            }
        }

        return result;
    }

    /**
     * Reshapes every binding input of the module into the final binding set.
     */
    static assemble(config: KmsIamConfig, keyNames: string[]): KmsBindingSet {
        const known = new Set(keyNames);
        const checkKey = (key: string, input: string) => {
            if (!known.has(key)) {
                throw new Error(`Unknown key '${key}' in ${input}`);
            }
        };

        const keyIam = Object.entries(config.keyIam || {});
        const keyIamAdditive = Object.entries(config.keyIamAdditive || {});

        keyIam.forEach(([key]) => checkKey(key, "keyIam"));
        keyIamAdditive.forEach(([key]) => checkKey(key, "keyIamAdditive"));
        Object.values(config.keyIamBindingsAdditive || {})
            .forEach(record => checkKey(record.key, "keyIamBindingsAdditive"));

        return this.mergeBindings(
            [
                this.authoritativeBindings(KEYRING_TARGET, config.iam),
                ...keyIam.map(([key, roles]) => this.authoritativeBindings(this.keyTarget(key), roles))
            ],
            [
                this.additiveBindings(KEYRING_TARGET, config.iamAdditive),
                this.individualBindings(config.iamBindingsAdditive),
                ...keyIamAdditive.map(([key, roles]) => this.additiveBindings(this.keyTarget(key), roles)),
                this.individualBindings(config.keyIamBindingsAdditive)
            ]
        );
    }
}

export {UtilsIam}
