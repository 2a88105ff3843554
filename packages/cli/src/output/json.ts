interface LookupMetadata {
  readonly pubkey: string;
  readonly duration: number;
}

export interface CliJsonOutput {
  readonly success: boolean;
  readonly data: unknown;
  readonly metadata: LookupMetadata;
}

interface CliJsonError {
  readonly success: false;
  readonly error: {
    readonly code: string;
    readonly message: string;
  };
}

export function formatJsonOutput(output: CliJsonOutput): string {
  return JSON.stringify(output, null, 2);
}

export function formatJsonError(code: string, message: string): string {
  const envelope: CliJsonError = { success: false, error: { code, message } };
  return JSON.stringify(envelope, null, 2);
}
