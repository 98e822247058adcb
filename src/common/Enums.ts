export enum KeyPurpose {
    ENCRYPT_DECRYPT = "ENCRYPT_DECRYPT",
    ASYMMETRIC_SIGN = "ASYMMETRIC_SIGN",
    ASYMMETRIC_DECRYPT = "ASYMMETRIC_DECRYPT",
    RAW_ENCRYPT_DECRYPT = "RAW_ENCRYPT_DECRYPT",
    MAC = "MAC"
}

export enum ProtectionLevel {
    SOFTWARE = "SOFTWARE",
    HSM = "HSM",
    EXTERNAL = "EXTERNAL",
    EXTERNAL_VPC = "EXTERNAL_VPC"
}

export enum ImportMethod {
    RSA_OAEP_3072_SHA1_AES_256 = "RSA_OAEP_3072_SHA1_AES_256",
    RSA_OAEP_4096_SHA1_AES_256 = "RSA_OAEP_4096_SHA1_AES_256",
    RSA_OAEP_3072_SHA256_AES_256 = "RSA_OAEP_3072_SHA256_AES_256",
    RSA_OAEP_4096_SHA256_AES_256 = "RSA_OAEP_4096_SHA256_AES_256",
    RSA_OAEP_3072_SHA256 = "RSA_OAEP_3072_SHA256",
    RSA_OAEP_4096_SHA256 = "RSA_OAEP_4096_SHA256"
}

export enum IamTargetType {
    KEYRING = "keyring",
    KEY = "key"
}
