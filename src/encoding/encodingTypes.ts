export type PrimitiveKind =
  | 'void'
  | 'bool'
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'long'
  | 'ulong'
  | 'int64'
  | 'uint64'
  | 'float'
  | 'double';

export type ReferenceKind = 'receiver' | 'class' | 'selector' | 'cstring';

export type EncodedType =
  | { kind: PrimitiveKind }
  | { kind: ReferenceKind }
  | { kind: 'pointer'; pointee: EncodedType }
  | { kind: 'aggregate'; name: string }
  | { kind: 'unresolved'; raw: string };

export type DecodeResult = {
  type: EncodedType;
  /** Number of characters of the input the type spans. */
  consumed: number;
};

export type MethodSignature = {
  returnType: EncodedType;
  /**
   * Receiver (`@`) and selector (`:`) come first by convention;
   * real parameters follow.
   */
  argTypes: EncodedType[];
};
