/**
 * Utils
 */
import {General} from './src/common/General';
import {UtilsIam} from './src/common/UtilsIam';
import {UtilsKms, KeyPurposeError} from './src/common/UtilsKms';

/**
 * Modules
 */
import {Kms} from './src/modules/Kms';
import {KmsIam} from './src/modules/KmsIam';
import {init} from './src/config';

export const KmsUtilsInit = {
    init
};

export const KmsUtilsCommon = {
    General,
    UtilsIam,
    UtilsKms
};

export const KmsUtilsModules = {
    Kms,
    KmsIam
};

export {KeyPurposeError};
export * from './src/common/Schemas';
export * from './src/types';
export * from './src/common/Enums';
