/**
 * Factory reset tools
 */

import { z } from 'zod';
import { CONFIG } from '../config.js';
import { renderPostReset, renderResetPlan, renderTroubleshooting } from '../guidance.js';
import { ErrorHandler } from '../utils/error-handler.js';
import { ResponseFormatter } from '../utils/formatter.js';
import { HostDetector } from '../utils/host-detector.js';
import { mtkClient } from '../utils/mtkclient-manager.js';
import { ResetRunner } from '../utils/reset-runner.js';
import { SafetyValidator } from '../utils/validator.js';
import { defineTool, FORMAT_PROPERTY } from './define.js';

const partitionSchema = z.string()
  .default(CONFIG.DEFAULT_PARTITION)
  .refine(p => SafetyValidator.isErasablePartition(p), {
    message: `Erasable partitions: ${CONFIG.ERASABLE_PARTITIONS.join(', ')}`
  });

// Schemas
export const GetResetPlanSchema = z.object({
  format: z.enum(['markdown', 'json']).default('markdown')
}).strict();

export const ErasePartitionSchema = z.object({
  partition: partitionSchema.describe('Partition to erase (default: userdata)'),
  confirm_token: z.string().describe('Confirmation token: CONFIRM_ERASE_PARTITION_<timestamp>'),
  format: z.enum(['markdown', 'json']).default('markdown')
}).strict();

export const FactoryResetSchema = z.object({
  confirm_token: z.string().describe('Confirmation token: CONFIRM_FACTORY_RESET_<timestamp>'),
  partition: partitionSchema.describe('Partition to erase (default: userdata)'),
  skip_setup: z.boolean().default(false).describe('Use the existing install without running setup'),
  skip_system_deps: z.boolean().default(false).describe('Skip OS package installation during setup'),
  format: z.enum(['markdown', 'json']).default('markdown')
}).strict();

export const GetTroubleshootingSchema = z.object({}).strict();

const runner = new ResetRunner(mtkClient);

// Tool implementations
export const resetTools = {
  get_reset_plan: defineTool({
    description: `Show what a factory reset will do before running it.

Returns the warnings, what will be installed on this host, prerequisites and the device connection
steps, plus a fresh confirmation token for factory_reset(). Present this to the user and get their
agreement before calling factory_reset().

Examples:
- get_reset_plan()`,
    inputSchema: {
      type: 'object',
      properties: { format: FORMAT_PROPERTY }
    },
    schema: GetResetPlanSchema,
    handler: async (args) => {
      return ErrorHandler.wrap(async () => {
        const host = HostDetector.detect();
        const token = SafetyValidator.generateConfirmationToken('FACTORY_RESET');

        if (args.format === 'json') {
          return ResponseFormatter.format({ host, confirmToken: token }, 'json');
        }
        return ResponseFormatter.truncate(renderResetPlan(host, token));
      });
    }
  }),

  erase_partition: defineTool({
    description: `Erase a partition with mtk (mtk e <partition>).

⚠️ DESTRUCTIVE OPERATION - REQUIRES CONFIRMATION TOKEN ⚠️

Erasing userdata is a factory reset: ALL user data is lost and cannot be recovered.
Requires a working MTKClient install (see setup_mtkclient()). The device must be powered off;
plug it in once the tool is waiting for it.

Erasable partitions: userdata (default), cache, metadata

Generate token: CONFIRM_ERASE_PARTITION_<current_timestamp>

Example:
- erase_partition(confirm_token="CONFIRM_ERASE_PARTITION_1699999999000")`,
    inputSchema: {
      type: 'object',
      properties: {
        partition: {
          type: 'string',
          enum: [...CONFIG.ERASABLE_PARTITIONS],
          default: CONFIG.DEFAULT_PARTITION,
          description: 'Partition to erase'
        },
        confirm_token: {
          type: 'string',
          description: 'Confirmation token (format: CONFIRM_ERASE_PARTITION_<timestamp>)'
        },
        format: FORMAT_PROPERTY
      },
      required: ['confirm_token']
    },
    schema: ErasePartitionSchema,
    handler: async (args) => {
      return ErrorHandler.wrap(async () => {
        SafetyValidator.validateConfirmationToken('ERASE_PARTITION', args.confirm_token);

        const result = await runner.erase(args.partition);

        if (args.format === 'json') {
          return ResponseFormatter.format(result, 'json');
        }
        return ResponseFormatter.success(`Partition erased: ${result.partition}`, {
          command: result.command,
          duration: result.duration,
          warning: 'Data is permanently deleted and unrecoverable'
        });
      });
    }
  }),

  factory_reset: defineTool({
    description: `Run the complete factory reset: detect host, check internet, set up MTKClient,
then erase the userdata partition.

⚠️ DESTRUCTIVE OPERATION - REQUIRES CONFIRMATION TOKEN ⚠️

Call get_reset_plan() first and show the user its warnings and connection steps.
The device must be completely powered off with the USB cable connected to the computer only;
plug it in when the tool is waiting.

Generate token: CONFIRM_FACTORY_RESET_<current_timestamp>

Examples:
- factory_reset(confirm_token="CONFIRM_FACTORY_RESET_1699999999000")
- factory_reset(confirm_token="...", skip_setup=true) → Reuse an existing install`,
    inputSchema: {
      type: 'object',
      properties: {
        confirm_token: {
          type: 'string',
          description: 'Confirmation token (format: CONFIRM_FACTORY_RESET_<timestamp>)'
        },
        partition: {
          type: 'string',
          enum: [...CONFIG.ERASABLE_PARTITIONS],
          default: CONFIG.DEFAULT_PARTITION,
          description: 'Partition to erase'
        },
        skip_setup: {
          type: 'boolean',
          default: false,
          description: 'Use the existing install without running setup'
        },
        skip_system_deps: {
          type: 'boolean',
          default: false,
          description: 'Skip OS package installation during setup'
        },
        format: FORMAT_PROPERTY
      },
      required: ['confirm_token']
    },
    schema: FactoryResetSchema,
    handler: async (args) => {
      return ErrorHandler.wrap(async () => {
        SafetyValidator.validateConfirmationToken('FACTORY_RESET', args.confirm_token);

        const result = await runner.factoryReset({
          partition: args.partition,
          skipSetup: args.skip_setup,
          skipSystemDeps: args.skip_system_deps
        });

        if (args.format === 'json') {
          return ResponseFormatter.format(result, 'json');
        }
        return ResponseFormatter.truncate(renderPostReset(mtkClient.status(), result.host.isLiveDvd));
      });
    }
  }),

  get_troubleshooting: defineTool({
    description: `Troubleshooting help for setup and device connection problems.

Examples:
- get_troubleshooting()`,
    inputSchema: {
      type: 'object',
      properties: {}
    },
    schema: GetTroubleshootingSchema,
    handler: async () => {
      const host = HostDetector.detect();
      return renderTroubleshooting(host.os === 'windows');
    }
  })
};
