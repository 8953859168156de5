/**
 * IPMI fan actuator
 *
 * Drives the chassis fans through `ipmitool raw` using the Dell PowerEdge
 * OEM fan commands (NetFn 0x30, command 0x30).
 */

import { ActuatorError, toError, type ActuatorOperation } from '../../errors.js';
import { runTool, type ToolRunner } from '../exec/run-tool.js';
import { assertDutyPercent, type FanActuator } from './fan-actuator.js';

const FAN_COMMAND_PREFIX = ['raw', '0x30', '0x30'] as const;

export const IPMI_ENTER_MANUAL_ARGS: readonly string[] = [...FAN_COMMAND_PREFIX, '0x01', '0x00'];
export const IPMI_RESTORE_AUTOMATIC_ARGS: readonly string[] = [...FAN_COMMAND_PREFIX, '0x01', '0x01'];

/** `0xff` addresses all fans at once */
export function ipmiSetDutyArgs(pct: number): string[] {
  assertDutyPercent(pct);
  return [...FAN_COMMAND_PREFIX, '0x02', '0xff', toHexByte(pct)];
}

export function toHexByte(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(2, '0')}`;
}

export interface IpmiFanActuatorOptions {
  binary?: string;
  timeoutMs?: number;
  runner?: ToolRunner;
}

export class IpmiFanActuator implements FanActuator {
  readonly name = 'ipmitool';
  private readonly binary: string;
  private readonly timeoutMs?: number;
  private readonly runner: ToolRunner;

  constructor(options: IpmiFanActuatorOptions = {}) {
    this.binary = options.binary ?? 'ipmitool';
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? runTool;
  }

  async enterManual(): Promise<void> {
    await this.invoke('enterManual', IPMI_ENTER_MANUAL_ARGS, 'take manual fan control from the BMC');
  }

  async setDuty(pct: number): Promise<void> {
    await this.invoke('setDuty', ipmiSetDutyArgs(pct), `set fan duty to ${pct}%`);
  }

  async restoreAutomatic(): Promise<void> {
    await this.invoke('restoreAutomatic', IPMI_RESTORE_AUTOMATIC_ARGS, 'return fan control to the BMC');
  }

  private async invoke(operation: ActuatorOperation, args: readonly string[], intent: string): Promise<void> {
    try {
      await this.runner(this.binary, args, { timeoutMs: this.timeoutMs });
    } catch (error) {
      const cause = toError(error);
      throw new ActuatorError(`Could not ${intent}: ${cause.message}`, operation, this.name, cause);
    }
  }
}
