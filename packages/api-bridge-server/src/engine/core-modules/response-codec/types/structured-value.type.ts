export type StructuredScalar = null | boolean | number | string;

export type StructuredList = StructuredValue[];

export type StructuredMap = { [key: string]: StructuredValue };

// Decoded responses, transform inputs and stored records all share this shape.
export type StructuredValue = StructuredScalar | StructuredList | StructuredMap;
