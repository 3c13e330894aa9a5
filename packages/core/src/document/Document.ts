import { Structure, StructureOptions } from "./Structure.js";

export class Document {
  structures: Structure[] = [];

  addStructure(identifier: string, options?: StructureOptions): Structure {
    const structure = new Structure(identifier, options);
    this.structures.push(structure);
    return structure;
  }

  /**
   * Find the first structure named `name`, in document order.
   */
  findStructure(name: string): Structure | undefined {
    for (const structure of this.structures) {
      const found = structure.find(name);
      if (found) return found;
    }
    return undefined;
  }
}
