export type TemplateValue = string | number | boolean | TemplateParams;

export interface TemplateParams {
  [field: string]: TemplateValue;
}

export type ExecutionTarget =
  | { kind: 'local' }
  | {
      kind: 'remote';
      keyPath: string;
      username: string;
      host: string;
      passphrase?: string;
    };

/**
 * @description Runs a rendered script and resolves with its standard output.
 */
export interface ScriptRunner {
  run(script: string): Promise<string>;
}
