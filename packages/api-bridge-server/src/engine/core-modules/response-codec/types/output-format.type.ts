export const OUTPUT_FORMATS = ['json', 'csv', 'xml', 'tabular', 'list'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const isOutputFormat = (format: string): format is OutputFormat =>
  OUTPUT_FORMATS.some((outputFormat) => outputFormat === format);
