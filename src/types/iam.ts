import {IamTargetType} from "../common/Enums";

export type KmsIamTarget =
    | {type: IamTargetType.KEYRING}
    | {type: IamTargetType.KEY; key: string};

export type KmsAuthoritativeBinding = {
    target: KmsIamTarget;
    role: string;
    members: string[];
};

export type KmsAdditiveBinding = {
    target: KmsIamTarget;
    role: string;
    member: string;
};

/**
 * Record names are structural: `keyring/<role>`, `key:<key>/<role>`, the same
 * followed by `/<member>` for additive grants, and `ring-binding:<name>` or
 * `key-binding:<name>` for caller-keyed grants.
 */
export type KmsBindingSet = {
    authoritative: Record<string, KmsAuthoritativeBinding>;
    additive: Record<string, KmsAdditiveBinding>;
};
