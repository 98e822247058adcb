import * as gcp from "@pulumi/gcp";
import {ImportMethod, KeyPurpose, ProtectionLevel} from "../common/Enums";

export type KmsKeyringDescriptor = {
    location?: string;
    name: string;
};

export type KmsVersionTemplate = {
    algorithm: string;
    protectionLevel?: ProtectionLevel | null;
};

export type KmsKeyPurposeConfig = {
    purpose?: KeyPurpose | null;
    versionTemplate?: KmsVersionTemplate | null;
};

export type KmsKeyConfig = KmsKeyPurposeConfig & {
    rotationPeriod?: string | null;
    labels?: Record<string, string> | null;
    skipInitialVersionCreation?: boolean | null;
    destroyScheduledDuration?: string | null;
    importOnly?: boolean | null;
};

export type KmsResolvedPurpose = {
    purpose: KeyPurpose;
    versionTemplate?: KmsVersionTemplate;
};

/**
 * role -> members
 */
export type KmsRoleMembers = Record<string, string[]>;

export type KmsIamBindingAdditive = {
    member: string;
    role: string;
};

export type KmsKeyIamBindingAdditive = KmsIamBindingAdditive & {
    key: string;
};

export type KmsImportJobConfig = {
    importMethod: ImportMethod;
    protectionLevel: ProtectionLevel;
};

export type KmsIamConfig = {
    iam?: KmsRoleMembers;
    iamAdditive?: KmsRoleMembers;
    iamBindingsAdditive?: Record<string, KmsIamBindingAdditive>;
    keyIam?: Record<string, KmsRoleMembers>;
    keyIamAdditive?: Record<string, KmsRoleMembers>;
    keyIamBindingsAdditive?: Record<string, KmsKeyIamBindingAdditive>;
};

export type KmsModuleConfig = KmsIamConfig & {
    projectId?: string;
    keyring: KmsKeyringDescriptor;
    keyringCreate?: boolean;
    keys?: Record<string, KmsKeyConfig | null>;
    keyPurpose?: Record<string, KmsKeyPurposeConfig>;
    keyPurposeDefaults?: KmsKeyPurposeConfig;
    protectKeys?: boolean;
    tagBindings?: Record<string, string>;
    importJobs?: Record<string, KmsImportJobConfig>;
};

export type KmsIamResult = {
    keyringBindings: Record<string, gcp.kms.KeyRingIAMBinding>;
    keyringMembers: Record<string, gcp.kms.KeyRingIAMMember>;
    keyBindings: Record<string, gcp.kms.CryptoKeyIAMBinding>;
    keyMembers: Record<string, gcp.kms.CryptoKeyIAMMember>;
};

export type KmsResult = {
    id: gcp.kms.KeyRing["id"];
    keyIds: Record<string, gcp.kms.CryptoKey["id"]>;
    keyring: gcp.kms.KeyRing;
    keys: Record<string, gcp.kms.CryptoKey>;
    location: gcp.kms.KeyRing["location"];
    name: gcp.kms.KeyRing["name"];
    iam: KmsIamResult;
    tagBindings: Record<string, gcp.tags.LocationTagBinding>;
    importJobs: Record<string, gcp.kms.KeyRingImportJob>;
};
