/**
 * Test doubles for splitsecret
 */

export { InMemoryPartStore } from "./store.js";
export type { StoredRecord, WriteRecord } from "./store.js";
export { FakeSecretsManagerApi } from "./aws.js";
export type { FakeSecret, FakeOperation, FakeCall } from "./aws.js";
