interface VerdictBase {
  readonly originalText: string;
  readonly reason: string;
  readonly flags: readonly string[];
}

export interface AllowVerdict extends VerdictBase {
  readonly action: 'allow';
}

export interface FlagVerdict extends VerdictBase {
  readonly action: 'flag';
}

export interface BlockVerdict extends VerdictBase {
  readonly action: 'block';
}

export interface ModifyVerdict extends VerdictBase {
  readonly action: 'modify';
  readonly modifiedText: string;
}

export type GuardrailVerdict = AllowVerdict | FlagVerdict | BlockVerdict | ModifyVerdict;

export type GuardrailAction = GuardrailVerdict['action'];
