export { normalizeRecord, parseRecord, normalizeKeyPart, computeIdentityKey } from './normalize';
export { dedupeBatch } from './dedupe';
export { LeadStoreWriter } from './writer';
export { WriteVerifier } from './verifier';
export type { VerifyResult } from './verifier';
export { LeadRetriever } from './retriever';
export type { RetrievalResult, RetrievalStrategy } from './retriever';
