/** Null handle for list links. */
export const NIL = -1;

/** slotIndex of a free node. */
export const SLOT_NONE = -1;

/** slotIndex of a node held in the overflow list. */
export const SLOT_OVERFLOW = -2;
