import { CheckResult, assertNever } from './checkResult';
import {
  AddressParts,
  AvatarData,
  DatasetData,
  MxData,
  RegistrabilityData,
  SmtpData,
  SyntaxData,
} from './email';

export interface CheckResults {
  syntax: CheckResult<SyntaxData>;
  registrability: CheckResult<RegistrabilityData>;
  mx: CheckResult<MxData>;
  disposable: CheckResult<DatasetData>;
  avatar: CheckResult<AvatarData>;
  free: CheckResult<DatasetData>;
  roleBasedUsername: CheckResult<DatasetData>;
  smtp: CheckResult<SmtpData>;
}

export type CheckName = keyof CheckResults;

export type CheckResultJson =
  | { status: 'passed'; data: unknown }
  | { status: 'failed'; data: unknown }
  | { status: 'skipped' }
  | { status: 'errored'; error: { name: string; message: string } };

export interface EmailValidationResultJson {
  email: string;
  parts: AddressParts | null;
  likelyDeliverable: boolean;
  validatedAt: string;
  validationTimeMs: number;
  checks: Record<CheckName, CheckResultJson>;
}

function checkToJson<T>(result: CheckResult<T>): CheckResultJson {
  switch (result.status) {
    case 'passed':
      return { status: 'passed', data: result.data };
    case 'failed':
      return { status: 'failed', data: result.data };
    case 'skipped':
      return { status: 'skipped' };
    case 'errored':
      return { status: 'errored', error: { name: result.error.name, message: result.error.message } };
    default:
      return assertNever(result);
  }
}

/**
 * Outcome of verifying one address. Immutable.
 */
export class EmailValidationResult implements CheckResults {
  readonly syntax: CheckResult<SyntaxData>;
  readonly registrability: CheckResult<RegistrabilityData>;
  readonly mx: CheckResult<MxData>;
  readonly disposable: CheckResult<DatasetData>;
  readonly avatar: CheckResult<AvatarData>;
  readonly free: CheckResult<DatasetData>;
  readonly roleBasedUsername: CheckResult<DatasetData>;
  readonly smtp: CheckResult<SmtpData>;
  readonly validatedAt: Date;

  constructor(
    readonly email: string,
    /** null when the address could not be split into username and hostname */
    readonly parts: AddressParts | null,
    checks: CheckResults,
    readonly validationTimeMs: number
  ) {
    this.syntax = checks.syntax;
    this.registrability = checks.registrability;
    this.mx = checks.mx;
    this.disposable = checks.disposable;
    this.avatar = checks.avatar;
    this.free = checks.free;
    this.roleBasedUsername = checks.roleBasedUsername;
    this.smtp = checks.smtp;
    this.validatedAt = new Date();
    Object.freeze(this);
  }

  /**
   * False when any of syntax, registrability, MX or disposable
   * definitively failed. Skipped and errored checks do not count against it.
   */
  isLikelyDeliverable(): boolean {
    return ![this.syntax, this.registrability, this.mx, this.disposable].some(check => check.status === 'failed');
  }

  checks(): CheckResults {
    return {
      syntax: this.syntax,
      registrability: this.registrability,
      mx: this.mx,
      disposable: this.disposable,
      avatar: this.avatar,
      free: this.free,
      roleBasedUsername: this.roleBasedUsername,
      smtp: this.smtp,
    };
  }

  toJSON(): EmailValidationResultJson {
    return {
      email: this.email,
      parts: this.parts,
      likelyDeliverable: this.isLikelyDeliverable(),
      validatedAt: this.validatedAt.toISOString(),
      validationTimeMs: this.validationTimeMs,
      checks: {
        syntax: checkToJson(this.syntax),
        registrability: checkToJson(this.registrability),
        mx: checkToJson(this.mx),
        disposable: checkToJson(this.disposable),
        avatar: checkToJson(this.avatar),
        free: checkToJson(this.free),
        roleBasedUsername: checkToJson(this.roleBasedUsername),
        smtp: checkToJson(this.smtp),
      },
    };
  }
}
