/**
 * Error taxonomy. Every failure the CLIs surface deliberately is an AppError
 * carrying the process exit code to use.
 */
export class AppError extends Error {
  constructor(message: string, public readonly exitCode: number = 1) {
    super(message);
    this.name = new.target.name;
  }
}

export class PhraseNotFoundError extends AppError {
  constructor(public readonly sentence: string, public readonly phrase: string) {
    super(`Highlight phrase "${phrase}" not found in sentence "${sentence}"`);
  }
}

export class SourceAssetNotFoundError extends AppError {
  constructor(
    public readonly configuredPath: string,
    public readonly searchRoot: string,
    public readonly expectedName: string
  ) {
    super(
      `Source image not found: ${configuredPath} and no ${expectedName} under ${searchRoot}`
    );
  }
}

export class ConfigError extends AppError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class MissingTextError extends AppError {
  constructor(missing: 'sentence' | 'highlight') {
    super(`No ${missing} text given on the command line or in the configuration`);
  }
}

export class ExternalToolError extends AppError {
  constructor(
    public readonly tool: string,
    public readonly toolExitCode: number | null,
    public readonly stderr: string
  ) {
    super(`${tool} exited with code ${toolExitCode ?? 'null'}${stderr ? `: ${stderr.trim()}` : ''}`);
  }
}
