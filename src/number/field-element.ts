// Prime field elements for PIL/ASM number literals

export interface FieldSpec {
  name: string;
  modulus: bigint;
}

/** 2^64 - 2^32 + 1 */
export const GOLDILOCKS: FieldSpec = {
  name: 'goldilocks',
  modulus: 0xffffffff00000001n,
};

/** Scalar field of the BN254 curve */
export const BN254: FieldSpec = {
  name: 'bn254',
  modulus: 21888242871839275222246405745257275088548364400416034343698204186575808495617n,
};

const FIELDS: FieldSpec[] = [GOLDILOCKS, BN254];

export function fieldByName(name: string): FieldSpec | undefined {
  return FIELDS.find(field => field.name === name);
}

/**
 * A canonical value in `[0, modulus)`. Construction is checked; no arithmetic
 * is provided.
 */
export class FieldElement {
  private constructor(
    private readonly value: bigint,
    public readonly field: FieldSpec,
  ) {}

  /** The element for `value`, or undefined when it is negative or not below the modulus. */
  static tryFrom(value: bigint, field: FieldSpec = GOLDILOCKS): FieldElement | undefined {
    if (value < 0n || value >= field.modulus) return undefined;
    return new FieldElement(value, field);
  }

  toBigInt(): bigint {
    return this.value;
  }

  equals(other: FieldElement): boolean {
    return this.field.modulus === other.field.modulus && this.value === other.value;
  }

  toString(): string {
    return this.value.toString();
  }

  toJSON(): string {
    return this.value.toString();
  }
}
