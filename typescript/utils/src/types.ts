/********* BASIC TYPES *********/
export type Address = string;
export type HexString = string;
// CB58-encoded 32 byte identifier of a subnet, chain or transaction
export type Cb58Id = string;
// `NodeID-` followed by the CB58 encoding of a 20 byte node identifier
export type NodeId = string;
