import { Injectable, Logger } from '@nestjs/common';

import {
  type DataDescription,
  type DataPreview,
  type PreviewOptions,
} from 'src/engine/core-modules/data-transformer/types/data-preview.type';
import { type TransformReport } from 'src/engine/core-modules/data-transformer/types/transform-report.type';
import { type TransformResult } from 'src/engine/core-modules/data-transformer/types/transform-result.type';
import { type TransformSpec } from 'src/engine/core-modules/data-transformer/types/transform-spec.type';
import { applyTransformSpec } from 'src/engine/core-modules/data-transformer/utils/apply-transform-spec.util';
import { describeStructuredValue } from 'src/engine/core-modules/data-transformer/utils/describe-structured-value.util';
import { parseTransformSpec } from 'src/engine/core-modules/data-transformer/utils/parse-transform-spec.util';
import { previewStructuredValue } from 'src/engine/core-modules/data-transformer/utils/preview-structured-value.util';
import { ResponseCodecService } from 'src/engine/core-modules/response-codec/services/response-codec.service';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

@Injectable()
export class DataTransformerService {
  private readonly logger = new Logger(DataTransformerService.name);

  constructor(private readonly responseCodecService: ResponseCodecService) {}

  apply(value: StructuredValue, spec: TransformSpec): StructuredValue {
    return this.applyWithReport(value, spec).value;
  }

  applyWithReport(
    value: StructuredValue,
    spec: TransformSpec,
  ): TransformReport {
    const report = applyTransformSpec(value, spec);

    for (const { step, message } of report.skippedSteps) {
      this.logger.warn(`Skipped transform step ${step}: ${message}`);
    }

    return report;
  }

  transform(
    value: StructuredValue,
    outputFormat: string,
    spec?: TransformSpec,
  ): TransformResult {
    const { value: transformed, skippedSteps }: TransformReport = spec
      ? this.applyWithReport(value, spec)
      : { value, skippedSteps: [] };

    const encoded = this.responseCodecService.encode(transformed, outputFormat);

    if (!encoded.success) {
      return encoded;
    }

    return {
      success: true,
      format: encoded.format,
      output: encoded.output,
      skippedSteps,
    };
  }

  parseTransformSpec(input: unknown): TransformSpec {
    return parseTransformSpec(input);
  }

  preview(
    value: StructuredValue,
    options: Partial<PreviewOptions> = {},
  ): DataPreview {
    return previewStructuredValue(value, options);
  }

  describe(value: StructuredValue): DataDescription {
    return describeStructuredValue(value);
  }
}
