export enum CommandType {
  command,
  prepare,
  listFiles,
  removeFile,
  doFile,
  compileFile,
  formatFs,
  heap,
  restart,
  uploadFile,
  downloadFile,
  execFile,
}

interface CommandArgsMapping {
  [CommandType.command]: { command: string };
  [CommandType.prepare]: object;
  [CommandType.listFiles]: object;
  [CommandType.removeFile]: { file: string };
  [CommandType.doFile]: { file: string };
  [CommandType.compileFile]: { file: string };
  [CommandType.formatFs]: object;
  [CommandType.heap]: object;
  [CommandType.restart]: object;
  [CommandType.uploadFile]: {
    local: string;
    // defaults to the base name of the local file
    remote?: string;
  };
  [CommandType.downloadFile]: {
    remote: string;
    // defaults to the remote name in the working directory
    local?: string;
  };
  [CommandType.execFile]: { file: string };
}

type RequiredArgs<T extends CommandType> = CommandArgsMapping[T];

/**
 * A command for a single command type.
 */
export interface TypedCommand<T extends CommandType> {
  type: T;
  args: RequiredArgs<T>;
}

/**
 * Any command, narrowed by its `type`.
 */
export type Command = {
  [T in CommandType]: TypedCommand<T>;
}[CommandType];
