import * as pulumi from "@pulumi/pulumi";
import * as gcp from "@pulumi/gcp";
import {InitConfig} from "../types/module";
import type {KmsModuleConfig, KmsResolvedPurpose, KmsResult} from "../types";
import {KmsModuleConfigSchema} from "../common/Schemas";
import {UtilsKms} from "../common/UtilsKms";
import {UtilsIam} from "../common/UtilsIam";
import {General} from "../common/General";
import {KmsIam} from "./KmsIam";
import {getInit} from "../config";

class Kms {
    private static __instance: Kms;
    private config: InitConfig;

    constructor() {
        this.config = getInit();
    }

    public static getInstance(): Kms {
        if (this.__instance == null) {
            this.__instance = new Kms();
        }

        return this.__instance;
    }

    async main(config: KmsModuleConfig): Promise<KmsResult> {
        KmsModuleConfigSchema.parse(config);

        const {
            keyring: descriptor,
            keyringCreate = true,
            keys = {},
            keyPurpose = {},
            keyPurposeDefaults,
            protectKeys = false,
            tagBindings = {},
            importJobs = {}
        } = config;

        const projectId = config.projectId || this.config.projectId;
        const location = descriptor.location || this.config.region;
        const provider = this.config.provider;
        const prefix = `${this.config.project}-${descriptor.name}`;

        /**
         * Resolve every input before declaring anything
         */
        const purposes: Record<string, KmsResolvedPurpose> = {};

        for (const [keyName, attrs] of Object.entries(keys)) {
            purposes[keyName] = UtilsKms.resolveKeyPurpose(keyName, attrs, keyPurpose[keyName], keyPurposeDefaults);
        }

        const bindings = UtilsIam.assemble(config, Object.keys(keys));
        KmsIam.getInstance().resourceNames(bindings);
        const tagNames = General.uniqueSlugs(Object.keys(tagBindings), "Tag binding");
        const options = General.resourceOptions(this.config);

        /**
         * Keyring
         */
        let keyring: gcp.kms.KeyRing;

        if (keyringCreate) {
            console.log(`Kms: Creating keyring '${descriptor.name}' in ${location}`);

            keyring = new gcp.kms.KeyRing(`${prefix}-keyring`, {
                project: projectId,
                location: location,
                name: descriptor.name
            }, options);
        } else {
            console.log(`Kms: Using existing keyring '${descriptor.name}' in ${location}`);

            const existing = gcp.kms.getKMSKeyRingOutput({
                project: projectId,
                location: location,
                name: descriptor.name
            }, provider ? {provider} : undefined);

            keyring = gcp.kms.KeyRing.get(`${prefix}-keyring`, existing.id, undefined, options);
        }

        /**
         * Keys
         */
        const cryptoKeys: Record<string, gcp.kms.CryptoKey> = {};

        for (const [keyName, attrs] of Object.entries(keys)) {
            const {purpose, versionTemplate} = purposes[keyName];

            cryptoKeys[keyName] = new gcp.kms.CryptoKey(`${prefix}-${keyName}-key`, {
                name: keyName,
                keyRing: keyring.id,
                purpose: purpose,
                rotationPeriod: attrs?.rotationPeriod ?? undefined,
                labels: General.nonEmpty({
                    ...this.config.generalLabels,
                    ...attrs?.labels
                }),
                versionTemplate: versionTemplate ? {
                    algorithm: versionTemplate.algorithm,
                    protectionLevel: versionTemplate.protectionLevel ?? undefined
                } : undefined,
                skipInitialVersionCreation: attrs?.skipInitialVersionCreation ?? undefined,
                destroyScheduledDuration: attrs?.destroyScheduledDuration ?? undefined,
                importOnly: attrs?.importOnly ?? undefined
            }, General.resourceOptions(this.config, {protect: protectKeys}));
        }

        if (Object.keys(cryptoKeys).length > 0) {
            console.log(`Kms: Declared ${Object.keys(cryptoKeys).length} key(s) in '${descriptor.name}'`);
        }

        /**
         * IAM
         */
        const iam = await KmsIam.getInstance().main(descriptor.name, keyring, cryptoKeys, bindings);

        /**
         * Tags
         */
        const tags: Record<string, gcp.tags.LocationTagBinding> = {};

        for (const [name, tagValue] of Object.entries(tagBindings)) {
            tags[name] = new gcp.tags.LocationTagBinding(`${prefix}-tag-${tagNames[name]}`, {
                parent: pulumi.interpolate`//cloudkms.googleapis.com/${keyring.id}`,
                tagValue: tagValue,
                location: keyring.location
            }, options);
        }

        /**
         * Import jobs
         */
        const jobs: Record<string, gcp.kms.KeyRingImportJob> = {};

        for (const [importJobId, job] of Object.entries(importJobs)) {
            jobs[importJobId] = new gcp.kms.KeyRingImportJob(`${prefix}-import-${importJobId}`, {
                keyRing: keyring.id,
                importJobId: importJobId,
                importMethod: job.importMethod,
                protectionLevel: job.protectionLevel
            }, options);
        }

        const keyIds: Record<string, pulumi.Output<string>> = {};

        for (const [keyName, key] of Object.entries(cryptoKeys)) {
            keyIds[keyName] = key.id;
        }

        return {
            id: keyring.id,
            keyIds,
            keyring,
            keys: cryptoKeys,
            location: keyring.location,
            name: keyring.name,
            iam,
            tagBindings: tags,
            importJobs: jobs
        };
    }
}

export {Kms}
