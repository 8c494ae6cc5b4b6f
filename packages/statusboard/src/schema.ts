import { z } from 'zod';

import { ConfigValidationError } from './errors';

export const VARIABLE_SENTINEL = '%';
export const DEFAULT_PORT = 8080;
export const NEVER_UPDATED = new Date(0).toISOString();

const timestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Timestamps must be RFC 3339' });

export const blockColorsSchema = z
  .object({
    background: z.string().optional(),
    title_color: z.string().optional(),
    title_background: z.string().optional(),
    title_font_size: z.string().optional(),
    label_color: z.string().optional(),
    label_background: z.string().optional(),
    label_font_size: z.string().optional(),
    value_color: z.string().optional(),
    value_background: z.string().optional(),
    value_font_size: z.string().optional()
  })
  .passthrough();

export const globalColorsSchema = z
  .object({
    page_background: z.string().optional()
  })
  .passthrough();

export const commandSpecSchema = z.object({
  label: z.string(),
  command: z.string().min(1, 'Command must not be empty'),
  output: z.string().default('')
});

const intervalSchema = z
  .number()
  .int('Interval must be a whole number of seconds')
  .positive('Interval must be greater than zero');

export const singleBlockSchema = z.object({
  type: z.literal('single'),
  title: z.string(),
  command: z.string().min(1, 'Command must not be empty'),
  interval: intervalSchema,
  output: z.string().default(''),
  last_updated: timestampSchema.default(NEVER_UPDATED),
  colors: blockColorsSchema.default({})
});

export const groupBlockSchema = z.object({
  type: z.literal('group'),
  title: z.string(),
  commands: z.array(commandSpecSchema).min(1, 'A group block needs at least one command'),
  interval: intervalSchema,
  last_updated: timestampSchema.default(NEVER_UPDATED),
  colors: blockColorsSchema.default({})
});

export const blockSchema = z.discriminatedUnion('type', [singleBlockSchema, groupBlockSchema]);

export const dashboardConfigSchema = z.object({
  blocks: z.array(blockSchema).default([]),
  last_updated: timestampSchema.default(NEVER_UPDATED),
  port: z
    .number()
    .int()
    .min(0)
    .max(65535)
    .default(DEFAULT_PORT)
    .transform((port) => (port === 0 ? DEFAULT_PORT : port)),
  version: z.string().default(''),
  colors: globalColorsSchema.default({})
});

export type BlockColors = z.infer<typeof blockColorsSchema>;
export type GlobalColors = z.infer<typeof globalColorsSchema>;
export type CommandSpec = z.infer<typeof commandSpecSchema>;
export type SingleBlock = z.infer<typeof singleBlockSchema>;
export type GroupBlock = z.infer<typeof groupBlockSchema>;
export type Block = z.infer<typeof blockSchema>;
export type BlockType = Block['type'];
export type DashboardConfig = z.infer<typeof dashboardConfigSchema>;
export type DashboardConfigInput = z.input<typeof dashboardConfigSchema>;

export const parseDashboardConfig = (input: unknown): DashboardConfig => {
  const result = dashboardConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError('Configuration failed validation', result.error.format());
  }
  return result.data;
};

/** Number of output slots a tick of this block produces. */
export const outputSlotCount = (block: Block): number => {
  switch (block.type) {
    case 'single':
      return 1;
    case 'group':
      return block.commands.length;
  }
};

/** Commands of a block in declared order, with the label shown next to each output. */
export const blockCommands = (block: Block): Array<{ label: string; command: string }> => {
  switch (block.type) {
    case 'single':
      return [{ label: '', command: block.command }];
    case 'group':
      return block.commands.map(({ label, command }) => ({ label, command }));
  }
};
