import { type SkippedTransformStep } from 'src/engine/core-modules/data-transformer/types/transform-report.type';
import { type ResponseCodecException } from 'src/engine/core-modules/response-codec/response-codec.exception';
import { type EncodedOutput } from 'src/engine/core-modules/response-codec/types/encode-result.type';
import { type OutputFormat } from 'src/engine/core-modules/response-codec/types/output-format.type';

export type TransformResult =
  | {
      success: true;
      format: OutputFormat;
      output: EncodedOutput;
      skippedSteps: SkippedTransformStep[];
    }
  | { success: false; error: ResponseCodecException };
