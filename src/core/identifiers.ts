import { DerivationOverflowError } from "../logging/error-handler";
import type { InstanceKind } from "../types/schemas";

/** Second octet of a derived MAC, tagging the resource type. */
export const MAC_KIND_TAG: Record<InstanceKind, number> = {
  vm: 0x01,
  container: 0x02,
};

/** Largest ID that fits the three middle octets. */
export const MAX_MAC_ENCODABLE_ID = 0xffffff;
export const MAX_NIC_INDEX = 0xff;

const MAC_PATTERN = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/;

const octet = (value: number): string => value.toString(16).padStart(2, "0");

/**
 * Derives `02:<kind>:<id b1>:<id b2>:<id b3>:<nic>`, a locally administered
 * address that stays stable for a given (kind, id, nic) triple.
 */
export function deriveMAC(kind: InstanceKind, id: number, nicIndex: number): string {
  if (!Number.isInteger(id) || id < 0 || id > MAX_MAC_ENCODABLE_ID) {
    throw new DerivationOverflowError(
      `ID ${id} cannot be encoded in a derived MAC (allowed 0-${MAX_MAC_ENCODABLE_ID})`,
      id,
    );
  }
  if (!Number.isInteger(nicIndex) || nicIndex < 0 || nicIndex > MAX_NIC_INDEX) {
    throw new DerivationOverflowError(
      `NIC index ${nicIndex} cannot be encoded in a derived MAC (allowed 0-${MAX_NIC_INDEX})`,
      nicIndex,
    );
  }
  const b1 = Math.floor(id / 65536) % 256;
  const b2 = Math.floor(id / 256) % 256;
  const b3 = id % 256;
  return ["02", octet(MAC_KIND_TAG[kind]), octet(b1), octet(b2), octet(b3), octet(nicIndex)].join(":");
}

export function deriveInstanceID(startID: number, index: number): number {
  return startID + index - 1;
}

/** Lower-cases a MAC; returns undefined when it is not `xx:xx:xx:xx:xx:xx`. */
export function normalizeMAC(mac: string): string | undefined {
  const normalized = mac.trim().toLowerCase();
  return MAC_PATTERN.test(normalized) ? normalized : undefined;
}
