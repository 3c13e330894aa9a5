export * from "./DataType.js";
export * from "./PropertyValue.js";
export { Primitive, type PrimitiveOptions } from "./Primitive.js";
export { Structure, type Child, type StructureOptions } from "./Structure.js";
export { Document } from "./Document.js";
