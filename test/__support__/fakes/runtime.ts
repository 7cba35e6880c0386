import { Failure, Success, type Result, type WorkloadRuntime, type WorkloadUnit } from '@/types';

type MaybePromise<T> = T | Promise<T>;

export interface FakeRuntimeOptions {
  /** Units returned by list and get; a function is re-evaluated on every call */
  units?: WorkloadUnit[] | (() => WorkloadUnit[]);
  /** Failure message for every list call */
  listError?: string;
  exec?: (unit: string, command: readonly string[]) => MaybePromise<Result<string>>;
  logs?: (unit: string, tailLines?: number) => MaybePromise<Result<string>>;
}

export interface FakeRuntime extends WorkloadRuntime {
  readonly calls: {
    list: Array<{ namespace: string; selector: string }>;
    get: string[];
    exec: Array<{ unit: string; command: string[] }>;
    logs: Array<{ unit: string; tailLines?: number }>;
  };
}

export function unit(name: string, ready = true, phase = ready ? 'Running' : 'Pending'): WorkloadUnit {
  return { name, namespace: 'default', phase, ready };
}

export function createFakeRuntime(options: FakeRuntimeOptions = {}): FakeRuntime {
  const calls: FakeRuntime['calls'] = { list: [], get: [], exec: [], logs: [] };
  const units = (): WorkloadUnit[] =>
    typeof options.units === 'function' ? options.units() : (options.units ?? []);

  return {
    kind: 'kubernetes',
    calls,

    async list(namespace, selector) {
      calls.list.push({ namespace, selector });
      if (options.listError) return Failure(options.listError);
      return Success(units());
    },

    async get(_namespace, name) {
      calls.get.push(name);
      return Success(units().find((u) => u.name === name) ?? null);
    },

    async exec(_namespace, name, command) {
      calls.exec.push({ unit: name, command });
      return options.exec ? options.exec(name, command) : Failure('exec not scripted');
    },

    async logs(_namespace, name, logOptions = {}) {
      const call: { unit: string; tailLines?: number } = { unit: name };
      if (logOptions.tailLines !== undefined) call.tailLines = logOptions.tailLines;
      calls.logs.push(call);
      return options.logs ? options.logs(name, logOptions.tailLines) : Success('');
    },
  };
}
