import { Cb58Id, NodeId } from '@subnet-warp/utils';

import { NotFoundError, OperationNotAllowedError } from '../errors.js';

import { classifySubnet } from './classify.js';
import {
  Blockchain,
  SubnetData,
  SubnetRecord,
  SubnetType,
  Validator,
} from './types.js';

export enum SubnetOperation {
  AddSubnetValidator = 'addSubnetValidator',
  AddPermissionlessValidator = 'addPermissionlessValidator',
  CreateBlockchain = 'createBlockchain',
}

const ALLOWED_OPERATIONS: Record<SubnetType, SubnetOperation[]> = {
  [SubnetType.PrimaryNetwork]: [SubnetOperation.AddPermissionlessValidator],
  [SubnetType.Permissioned]: [
    SubnetOperation.AddSubnetValidator,
    SubnetOperation.CreateBlockchain,
  ],
  [SubnetType.Elastic]: [
    SubnetOperation.AddPermissionlessValidator,
    SubnetOperation.CreateBlockchain,
  ],
};

/**
 * A Subnet and its blockchains and validators. Instances are not mutated;
 * reconciliation produces updated copies through the `with*` methods.
 */
export class Subnet implements SubnetData {
  public readonly id: Cb58Id;
  public readonly controlKeys: string[];
  public readonly threshold: number;
  public readonly subnetType: SubnetType;
  public readonly blockchains: Blockchain[];
  public readonly validators: Validator[];
  public readonly pendingValidators: Validator[];

  constructor(data: SubnetRecord & Partial<SubnetData>) {
    this.id = data.id;
    this.controlKeys = [...data.controlKeys];
    this.threshold = data.threshold;
    this.subnetType =
      data.subnetType ?? classifySubnet(data.threshold, data.id);
    this.blockchains = [...(data.blockchains ?? [])];
    this.validators = [...(data.validators ?? [])];
    this.pendingValidators = [...(data.pendingValidators ?? [])];
  }

  toData(): SubnetData {
    return {
      id: this.id,
      controlKeys: this.controlKeys,
      threshold: this.threshold,
      subnetType: this.subnetType,
      blockchains: this.blockchains,
      validators: this.validators,
      pendingValidators: this.pendingValidators,
    };
  }

  // Registry fields only, the classification follows them
  withRecord(record: SubnetRecord): Subnet {
    return new Subnet({
      ...this.toData(),
      controlKeys: record.controlKeys,
      threshold: record.threshold,
      subnetType: classifySubnet(record.threshold, this.id),
    });
  }

  withBlockchains(blockchains: Blockchain[]): Subnet {
    return new Subnet({ ...this.toData(), blockchains });
  }

  withValidators(validators: Validator[]): Subnet {
    return new Subnet({ ...this.toData(), validators });
  }

  withPendingValidators(pendingValidators: Validator[]): Subnet {
    return new Subnet({ ...this.toData(), pendingValidators });
  }

  getBlockchain(id: Cb58Id): Blockchain {
    const blockchain = this.blockchains.find((chain) => chain.id === id);
    if (!blockchain) {
      throw new NotFoundError(
        { type: 'subnet', id: this.id },
        'blockchain',
        id,
      );
    }
    return blockchain;
  }

  getBlockchainByName(name: string): Blockchain {
    const blockchain = this.blockchains.find((chain) => chain.name === name);
    if (!blockchain) {
      throw new NotFoundError(
        { type: 'subnet', id: this.id },
        'blockchain',
        name,
      );
    }
    return blockchain;
  }

  getValidator(nodeId: NodeId): Validator {
    const validator = this.validators.find((v) => v.nodeId === nodeId);
    if (!validator) {
      throw new NotFoundError(
        { type: 'subnet', id: this.id },
        'validator',
        nodeId,
      );
    }
    return validator;
  }

  assertOperationAllowed(operation: SubnetOperation): void {
    if (!ALLOWED_OPERATIONS[this.subnetType].includes(operation)) {
      throw new OperationNotAllowedError(
        operation,
        `${this.subnetType} Subnet '${this.id}'`,
      );
    }
  }
}
