import {KeyPurpose} from "./Enums";
import type {KmsKeyPurposeConfig, KmsResolvedPurpose, KmsVersionTemplate} from "../types";

class KeyPurposeError extends Error {
    constructor(readonly keyName: string, readonly purpose: KeyPurpose) {
        super(`Key '${keyName}' has purpose ${purpose} but no versionTemplate.algorithm was provided`);
        this.name = "KeyPurposeError";
    }
}

class UtilsKms {
    /**
     * First source wins: the key's own attributes, then the per-key override,
     * then the module defaults. Purpose and version template resolve
     * independently.
     */
    static resolveKeyPurpose(keyName: string, ...sources: (KmsKeyPurposeConfig | null | undefined)[]): KmsResolvedPurpose {
        let purpose: KeyPurpose | undefined;
        let versionTemplate: KmsVersionTemplate | undefined;

        for (const source of sources) {
            purpose = purpose || source?.purpose || undefined;
            versionTemplate = versionTemplate || source?.versionTemplate || undefined;
        }

        purpose = purpose || KeyPurpose.ENCRYPT_DECRYPT;

        if (purpose !== KeyPurpose.ENCRYPT_DECRYPT && !versionTemplate?.algorithm) {
            throw new KeyPurposeError(keyName, purpose);
        }

        return {purpose, versionTemplate};
    }
}

export {UtilsKms, KeyPurposeError}
