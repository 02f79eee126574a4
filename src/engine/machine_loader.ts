import { readFileSync } from 'node:fs';
import path from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

const machineDefSchema = z.object({
  machine: z.string().min(1),
  initial: z.string().min(1),
  states: z.record(z.array(z.string())),
});

export type MachineDef = z.infer<typeof machineDefSchema>;

export interface StateMachine<S extends string> {
  name: string;
  initial: S;
  states: readonly S[];
  successors(from: S): readonly S[];
  canTransition(from: S, to: S): boolean;
  isTerminal(state: S): boolean;
}

const cache = new Map<string, MachineDef>();

export function machinesDir() {
  return path.join(process.cwd(), 'src', 'machines');
}

export function readMachineDef(name: string, dir = machinesDir()): MachineDef {
  const cached = cache.get(`${dir}:${name}`);
  if (cached) return cached;
  const file = path.join(dir, `${name}.yaml`);
  const parsed = machineDefSchema.safeParse(parse(readFileSync(file, 'utf8')));
  if (!parsed.success) {
    throw new Error(`Invalid machine definition ${file}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  if (parsed.data.machine !== name) throw new Error(`Machine file ${file} declares "${parsed.data.machine}"`);
  cache.set(`${dir}:${name}`, parsed.data);
  return parsed.data;
}

/**
 * Binds a YAML definition to the state union the code knows about. Every known state must be
 * declared and every declared state and successor must be known.
 */
export function buildMachine<S extends string>(def: MachineDef, known: readonly S[]): StateMachine<S> {
  const isKnown = (value: string): value is S => known.some(k => k === value);
  const table = new Map<S, readonly S[]>();
  for (const [state, next] of Object.entries(def.states)) {
    if (!isKnown(state)) throw new Error(`Unknown state "${state}" in machine ${def.machine}`);
    const successors: S[] = [];
    for (const to of next) {
      if (!isKnown(to)) throw new Error(`Unknown successor "${to}" of ${state} in machine ${def.machine}`);
      successors.push(to);
    }
    table.set(state, successors);
  }
  const missing = known.filter(s => !table.has(s));
  if (missing.length) throw new Error(`Machine ${def.machine} does not declare: ${missing.join(', ')}`);
  const initial = def.initial;
  if (!isKnown(initial)) throw new Error(`Unknown initial state "${initial}" in machine ${def.machine}`);

  const successors = (from: S): readonly S[] => table.get(from) ?? [];
  return {
    name: def.machine,
    initial,
    states: known,
    successors,
    canTransition: (from, to) => successors(from).includes(to),
    isTerminal: state => successors(state).length === 0,
  };
}

export function loadMachine<S extends string>(name: string, known: readonly S[]): StateMachine<S> {
  return buildMachine(readMachineDef(name), known);
}
