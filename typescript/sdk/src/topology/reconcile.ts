import { indexBy } from '@subnet-warp/utils';

import { Subnet } from './Subnet.js';
import { Blockchain, SubnetRecord, Validator } from './types.js';

function uniqueBy<T, K>(values: T[], keyFn: (value: T) => K): T[] {
  const seen = new Set<K>();
  return values.filter((value) => {
    const key = keyFn(value);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Asymmetric merge of the registry's Subnet listing into the local Subnets.
 *
 * Known Subnets only take the registry's control keys and threshold (and the
 * classification derived from them). Unknown Subnets are appended as listed.
 * Subnets missing from the listing are kept, since it may be partial.
 */
export function mergeSubnets(
  local: Subnet[],
  remote: SubnetRecord[],
): Subnet[] {
  const remoteById = indexBy(remote, (record) => record.id);
  const localIds = new Set(local.map((subnet) => subnet.id));

  const merged = local.map((subnet) => {
    const record = remoteById.get(subnet.id);
    return record ? subnet.withRecord(record) : subnet;
  });
  const added = [...remoteById.values()]
    .filter((record) => !localIds.has(record.id))
    .map((record) => new Subnet(record));

  return [...merged, ...added];
}

/**
 * Merge the registry's blockchains into each local Subnet, matching by name.
 *
 * Matched chains take the `id`, `vmId` and `subnetId` of the first registry
 * chain with that name and keep their locally configured `rpcUrl` and
 * `vmType`. Every registry chain whose name is not configured locally is
 * appended in listing order unless its ID is already present. No local chain
 * is ever removed. Registry chains of Subnets that are not known locally are
 * ignored.
 */
export function mergeBlockchains(
  subnets: Subnet[],
  remote: Blockchain[],
): Subnet[] {
  return subnets.map((subnet) => {
    const candidates = remote.filter((chain) => chain.subnetId === subnet.id);

    const updated = subnet.blockchains.map((local) => {
      const match = candidates.find((chain) => chain.name === local.name);
      return match
        ? {
            ...local,
            id: match.id,
            vmId: match.vmId,
            subnetId: match.subnetId,
          }
        : local;
    });

    const localNames = new Set(subnet.blockchains.map((chain) => chain.name));
    const knownIds = new Set(updated.map((chain) => chain.id));
    const added: Blockchain[] = [];
    for (const chain of candidates) {
      if (localNames.has(chain.name) || knownIds.has(chain.id)) continue;
      knownIds.add(chain.id);
      added.push(chain);
    }

    return subnet.withBlockchains([...updated, ...added]);
  });
}

/**
 * Validators are a snapshot of the registry: the listing replaces the
 * current set, in the order returned, keeping the first entry of a node ID.
 */
export function replaceValidators(
  subnet: Subnet,
  validators: Validator[],
): Subnet {
  return subnet.withValidators(uniqueBy(validators, (v) => v.nodeId));
}

export function replacePendingValidators(
  subnet: Subnet,
  validators: Validator[],
): Subnet {
  return subnet.withPendingValidators(uniqueBy(validators, (v) => v.nodeId));
}
