export const OP_0 = 0x00;
/** Largest length a bare length byte can push */
export const MAX_DIRECT_PUSH = 0x4b;
export const OP_PUSHDATA1 = 0x4c;
export const OP_PUSHDATA2 = 0x4d;
export const MAX_PUSHDATA2 = 0xffff;

export { OP_CHECKZKP } from "../protocol";
