export { CognitoAuthenticator, type Authenticator, type CognitoOptions } from './cognito';
export { FileCredentialCache, MemoryCredentialCache, type CredentialCache } from './credentialCache';
export { isExpired, readIdentityClaims, type Credential, type IdentityClaims } from './credentials';
export { resolveUser, User, type ResolveUserOptions } from './user';
