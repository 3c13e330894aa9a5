import type { DataType, PrimitiveElement } from "./DataType.js";

export interface PrimitiveOptions {
  name?: string;
  /** 0 for flat scalar data, otherwise the length of every tuple in `data` */
  vectorSize?: number;
  comment?: string;
  maxElementsPerLine?: number;
}

/**
 * Leaf node holding a sequence of scalars or fixed-size vectors.
 *
 * When `vectorSize > 0` every element of `data` must be a tuple of exactly
 * `vectorSize` scalars. This is not checked here; the serializer rejects
 * malformed tuples.
 */
export class Primitive {
  readonly kind = "primitive";
  name: string | undefined;
  vectorSize: number;
  data: PrimitiveElement[];
  comment: string | undefined;
  /** Maximum number of elements (or vectors) per output line */
  maxElementsPerLine: number | undefined;

  constructor(
    readonly dataType: DataType,
    data: readonly PrimitiveElement[],
    options: PrimitiveOptions = {}
  ) {
    this.data = [...data];
    this.name = options.name || undefined;
    this.vectorSize = options.vectorSize ?? 0;
    this.comment = options.comment;
    this.maxElementsPerLine = options.maxElementsPerLine;
  }

  isSimple(): boolean {
    return this.data.length === 1 && this.vectorSize <= 4;
  }
}
