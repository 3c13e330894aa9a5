import { z } from "zod";

export const WriterConfiguration = z.object({
  rounding: z
    .number()
    .int()
    .nonnegative()
    .nullable()
    .describe(
      `Number of decimal places kept for float and double values, or null to keep full precision`
    )
    .default(6),
  maxElementsPerLine: z
    .number()
    .int()
    .positive()
    .optional()
    .describe(
      `Maximum number of elements or vectors per line for primitives without their own limit`
    ),
  debug: z
    .boolean()
    .describe(`Enable debug logging of render and write steps`)
    .default(false),
});

export type WriterConfiguration = z.infer<typeof WriterConfiguration>;

export type WriterConfigurationInput = z.input<typeof WriterConfiguration>;
