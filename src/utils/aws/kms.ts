import { InvalidKmsArnError } from '../error.js';

const ARN_PREFIX = 'arn:';
const ARN_FIELD_COUNT = 6;
const KEY_RESOURCE_PREFIX = 'key/';

export function isKmsArn(keyId: string): boolean {
  return keyId.startsWith(ARN_PREFIX);
}

/**
 * Key id to use in the replica region. A key ARN
 * (`arn:<partition>:kms:<region>:<account>:key/<id>`) gets its region swapped;
 * aliases and bare key ids are returned unchanged.
 */
export function replicaKmsKeyId(keyId: string, replicaRegion: string): string {
  if (!isKmsArn(keyId)) {
    return keyId;
  }

  const fields = keyId.split(':');
  if (fields.length !== ARN_FIELD_COUNT) {
    throw new InvalidKmsArnError(`invalid KMS key ARN ${keyId}: expected ${ARN_FIELD_COUNT} fields, got ${fields.length}`, {
      kms: keyId,
    });
  }

  const [, partition, service, , account, resource] = fields;
  if (service !== 'kms') {
    throw new InvalidKmsArnError(`invalid KMS key ARN ${keyId}: service must be 'kms'`, { kms: keyId });
  }
  if (!account) {
    throw new InvalidKmsArnError(`invalid KMS key ARN ${keyId}: account is empty`, { kms: keyId });
  }
  if (!resource?.startsWith(KEY_RESOURCE_PREFIX) || resource.length === KEY_RESOURCE_PREFIX.length) {
    throw new InvalidKmsArnError(`invalid KMS key ARN ${keyId}: resource must be 'key/<id>'`, { kms: keyId });
  }

  return ['arn', partition, service, replicaRegion, account, resource].join(':');
}
