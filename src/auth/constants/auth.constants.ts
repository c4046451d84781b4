export const PASSWORD_REGEX = /^(?=.*[A-Z])(?=.*[a-z])(?=.*\d).{8,}$/;

export const PASSWORD_MAX_LENGTH = 128;

export const SCRYPT_KEY_LENGTH = 64;
