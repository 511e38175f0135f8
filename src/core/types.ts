export type Term = {
  neg: boolean;
  coef: bigint;
  scale: number;
};

export type Int64Parts = {
  whole: bigint;
  frac: bigint;
};

export type BsonValue = {
  type: number;
  data: Uint8Array;
};

export type SqlValue = string | null;

export type FormatFlags = {
  plus: boolean;
  space: boolean;
  zero: boolean;
  minus: boolean;
};

export type FormatDirective = {
  verb: string;
  flags: FormatFlags;
  width?: number;
  precision?: number;
};
