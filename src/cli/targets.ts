/**
 * Target Flags
 *
 * Turns the mutually exclusive --vhd-path / --uuid / --dev-name /
 * --mount-point flags into the service's target types.
 */

import { InvalidInputError } from '../core/errors.js';
import type { DetachTarget, FormatTarget, UnmountTarget } from '../core/service.js';

/**
 * Flags that name a VHD
 */
export interface TargetFlags {
  vhdPath?: string;
  uuid?: string;
  devName?: string;
  mountPoint?: string;
}

type TargetFlag = keyof TargetFlags;

const FLAG_NAMES: Record<TargetFlag, string> = {
  vhdPath: '--vhd-path',
  uuid: '--uuid',
  devName: '--dev-name',
  mountPoint: '--mount-point',
};

/**
 * The single flag set among `allowed`, or undefined when none is.
 *
 * @throws InvalidInputError when more than one is set
 */
export function pickFlag<K extends TargetFlag>(
  flags: TargetFlags,
  allowed: readonly K[]
): { flag: K; value: string } | undefined {
  const given = allowed.filter((flag) => flags[flag] !== undefined);
  if (given.length > 1) {
    throw new InvalidInputError(
      `Options ${given.map((flag) => FLAG_NAMES[flag]).join(', ')} cannot be combined`,
      undefined,
      'Name the VHD one way only.'
    );
  }
  const flag = given[0];
  if (flag === undefined) {
    return undefined;
  }
  return { flag, value: flags[flag] ?? '' };
}

function requireFlag<K extends TargetFlag>(
  flags: TargetFlags,
  allowed: readonly K[]
): { flag: K; value: string } {
  const picked = pickFlag(flags, allowed);
  if (!picked) {
    throw new InvalidInputError(
      `One of ${allowed.map((flag) => FLAG_NAMES[flag]).join(', ')} is required`
    );
  }
  return picked;
}

export function toDetachTarget(flags: TargetFlags): DetachTarget {
  const { flag, value } = requireFlag(flags, ['vhdPath', 'uuid', 'devName'] as const);
  switch (flag) {
    case 'vhdPath':
      return { path: value };
    case 'uuid':
      return { uuid: value };
    case 'devName':
      return { deviceName: value };
  }
}

export function toUnmountTarget(flags: TargetFlags): UnmountTarget {
  const { flag, value } = requireFlag(flags, ['vhdPath', 'uuid', 'mountPoint'] as const);
  return unmountTargetOf(flag, value);
}

export function toFormatTarget(flags: TargetFlags): FormatTarget {
  const { flag, value } = requireFlag(flags, ['vhdPath', 'devName'] as const);
  return flag === 'vhdPath' ? { path: value } : { deviceName: value };
}

/**
 * Optional status filter; all VHDs when no flag is set.
 */
export function toStatusTarget(flags: TargetFlags): UnmountTarget | undefined {
  const picked = pickFlag(flags, ['vhdPath', 'uuid', 'mountPoint'] as const);
  return picked ? unmountTargetOf(picked.flag, picked.value) : undefined;
}

function unmountTargetOf(flag: 'vhdPath' | 'uuid' | 'mountPoint', value: string): UnmountTarget {
  switch (flag) {
    case 'vhdPath':
      return { path: value };
    case 'uuid':
      return { uuid: value };
    case 'mountPoint':
      return { mountPoint: value };
  }
}
