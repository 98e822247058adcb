import {z} from "zod";
import {ImportMethod, KeyPurpose, ProtectionLevel} from "./Enums";

const ROTATION_PERIOD = /^[0-9]+(\.[0-9]{1,9})?s$/;
const MIN_ROTATION_SECONDS = 86400;
const RESOURCE_ID = /^[a-zA-Z0-9_-]{1,63}$/;
const RESOURCE_ID_MESSAGE = "must be 1-63 letters, digits, '-' or '_'";

const RoleMembersSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

export const VersionTemplateSchema = z.object({
    algorithm: z.string().min(1),
    protectionLevel: z.nativeEnum(ProtectionLevel).nullish(),
});

export const KeyPurposeConfigSchema = z.object({
    purpose: z.nativeEnum(KeyPurpose).nullish(),
    versionTemplate: VersionTemplateSchema.nullish(),
});

export const KeyConfigSchema = KeyPurposeConfigSchema.extend({
    rotationPeriod: z.string()
        .regex(ROTATION_PERIOD, "rotationPeriod must be a duration in seconds, e.g. '7776000s'")
        .refine(x => parseFloat(x) >= MIN_ROTATION_SECONDS, `rotationPeriod must be at least ${MIN_ROTATION_SECONDS}s`)
        .nullish(),
    labels: z.record(z.string(), z.string()).nullish(),
    skipInitialVersionCreation: z.boolean().nullish(),
    destroyScheduledDuration: z.string().regex(ROTATION_PERIOD).nullish(),
    importOnly: z.boolean().nullish(),
});

export const KmsModuleConfigSchema = z.object({
    projectId: z.string().min(1).optional(),
    keyring: z.object({
        location: z.string().min(1).optional(),
        name: z.string().regex(RESOURCE_ID, `keyring name ${RESOURCE_ID_MESSAGE}`),
    }),
    keyringCreate: z.boolean().optional(),
    keys: z.record(z.string().regex(RESOURCE_ID, `key name ${RESOURCE_ID_MESSAGE}`), KeyConfigSchema.nullable()).optional(),
    keyPurpose: z.record(z.string(), KeyPurposeConfigSchema).optional(),
    keyPurposeDefaults: KeyPurposeConfigSchema.optional(),
    protectKeys: z.boolean().optional(),
    tagBindings: z.record(z.string(), z.string().startsWith("tagValues/")).optional(),
    importJobs: z.record(z.string().regex(RESOURCE_ID, `import job id ${RESOURCE_ID_MESSAGE}`), z.object({
        importMethod: z.nativeEnum(ImportMethod),
        protectionLevel: z.nativeEnum(ProtectionLevel),
    })).optional(),
    iam: RoleMembersSchema.optional(),
    iamAdditive: RoleMembersSchema.optional(),
    iamBindingsAdditive: z.record(z.string(), z.object({
        member: z.string().min(1),
        role: z.string().min(1),
    })).optional(),
    keyIam: z.record(z.string(), RoleMembersSchema).optional(),
    keyIamAdditive: z.record(z.string(), RoleMembersSchema).optional(),
    keyIamBindingsAdditive: z.record(z.string(), z.object({
        key: z.string().min(1),
        member: z.string().min(1),
        role: z.string().min(1),
    })).optional(),
});
