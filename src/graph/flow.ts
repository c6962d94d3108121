import {
  BACKEND_ROLES,
  DATABASE_ROLES,
  FRONTEND_ROLES,
  UI_FRAMEWORKS,
  type EntryPointSet,
  type FolderClassification
} from '../analysis/types.js';
import { FlowOptions } from '../config/schema.js';

export type StageId = 'entry' | 'frontend' | 'backend' | 'middleware' | 'database' | 'external';

export type StageType = 'entry_point' | 'frontend' | 'backend' | 'middleware' | 'database' | 'external_services';

export interface Stage {
  id: StageId;
  type: StageType;
  components: string[];
  description: string;
}

export interface Connection {
  fromStageId: StageId;
  toStageId: StageId;
  label: string;
}

export interface FlowTransfer {
  stages: Stage[];
  connections: Connection[];
}

export class ExecutionFlow {
  private readonly stages: Stage[] = [];
  private readonly connections: Connection[] = [];

  addStage(stage: Stage): void {
    if (this.hasStage(stage.id)) throw new Error(`Duplicate stage id: ${stage.id}`);
    this.stages.push({ ...stage, components: [...stage.components] });
  }

  addConnection(fromStageId: StageId, toStageId: StageId, label: string): void {
    if (!this.hasStage(fromStageId) || !this.hasStage(toStageId)) {
      throw new Error(`Connection ${fromStageId} -> ${toStageId} references a missing stage`);
    }
    this.connections.push({ fromStageId, toStageId, label });
  }

  hasStage(id: StageId): boolean {
    return this.stages.some((s) => s.id === id);
  }

  get stageCount(): number {
    return this.stages.length;
  }

  toTransferObject(): FlowTransfer {
    return {
      stages: this.stages.map((s) => ({ ...s, components: [...s.components] })),
      connections: this.connections.map((c) => ({ ...c }))
    };
  }
}

export interface FlowInput {
  entrypoints: EntryPointSet;
  folders: FolderClassification;
  frameworks: readonly string[];
  databases: readonly string[];
  infrastructure: readonly string[];
}

export const MIDDLEWARE_ROLES = ['middleware', 'utils', 'utilities', 'scripts'];

const ORCHESTRATION = ['Docker', 'Kubernetes'];

interface FlowContext {
  input: FlowInput;
  options: FlowOptions;
  flow: ExecutionFlow;
  entries: string[];
}

interface FlowStep {
  id: StageId;
  type: StageType;
  description: string;
  /** Components for the stage; an empty list means the stage is skipped. */
  components(ctx: FlowContext): string[];
  connect(ctx: FlowContext): void;
}

function foldersWithRole(folders: FolderClassification, roles: readonly string[]): string[] {
  return Object.entries(folders)
    .filter(([, info]) => roles.includes(info.role))
    .map(([folder]) => folder);
}

function externalServices(input: FlowInput): string[] {
  const out: string[] = [];
  if (input.infrastructure.some((i) => ORCHESTRATION.includes(i))) out.push('Container orchestration');
  if (input.databases.includes('Redis')) out.push('Redis (caching/queue)');
  if (input.databases.includes('Elasticsearch')) out.push('Elasticsearch (search)');
  return out;
}

const STEPS: FlowStep[] = [
  {
    id: 'entry',
    type: 'entry_point',
    description: 'Application entry points',
    components: (ctx) => ctx.entries.slice(0, ctx.options.maxEntryComponents),
    connect: () => {}
  },
  {
    id: 'frontend',
    type: 'frontend',
    description: 'Frontend/UI layer',
    components: (ctx) => foldersWithRole(ctx.input.folders, FRONTEND_ROLES),
    connect: ({ flow, input }) => {
      if (flow.hasStage('entry') && input.frameworks.some((f) => UI_FRAMEWORKS.includes(f))) {
        flow.addConnection('entry', 'frontend', 'Renders UI');
      }
    }
  },
  {
    id: 'backend',
    type: 'backend',
    description: 'Backend services and APIs',
    components: (ctx) => foldersWithRole(ctx.input.folders, BACKEND_ROLES),
    connect: ({ flow }) => {
      if (flow.hasStage('frontend')) flow.addConnection('frontend', 'backend', 'API calls');
      else if (flow.hasStage('entry')) flow.addConnection('entry', 'backend', 'Processes requests');
    }
  },
  {
    id: 'middleware',
    type: 'middleware',
    description: 'Middleware and utilities',
    components: (ctx) => {
      const folders = foldersWithRole(ctx.input.folders, MIDDLEWARE_ROLES);
      // One utility folder alone is too weak a signal.
      return folders.length >= ctx.options.minMiddlewareFolders ? folders : [];
    },
    connect: ({ flow }) => {
      if (flow.hasStage('backend')) flow.addConnection('backend', 'middleware', 'Uses utilities');
    }
  },
  {
    id: 'database',
    type: 'database',
    description: 'Data persistence layer',
    components: (ctx) => [...foldersWithRole(ctx.input.folders, DATABASE_ROLES), ...ctx.input.databases],
    connect: ({ flow }) => {
      if (flow.hasStage('backend')) flow.addConnection('backend', 'database', 'Data operations');
      else if (flow.hasStage('entry')) flow.addConnection('entry', 'database', 'Data operations');
    }
  },
  {
    id: 'external',
    type: 'external_services',
    description: 'External services and infrastructure',
    components: (ctx) => externalServices(ctx.input),
    connect: ({ flow }) => {
      if (flow.hasStage('backend')) flow.addConnection('backend', 'external', 'External calls');
    }
  }
];

/**
 * Scripted entry → frontend → backend → middleware → database → external progression.
 * Each step adds its stage only when it has components, then wires itself to earlier stages.
 */
export function synthesizeFlow(input: FlowInput, options: Partial<FlowOptions> = {}): ExecutionFlow {
  const flow = new ExecutionFlow();
  const ctx: FlowContext = {
    input,
    options: FlowOptions.parse(options),
    flow,
    entries: [
      ...input.entrypoints.applicationFiles.map((e) => e.path),
      ...input.entrypoints.frameworkEntrypoints.map((e) => e.path)
    ]
  };

  for (const step of STEPS) {
    const components = step.components(ctx);
    if (components.length === 0) continue;
    flow.addStage({ id: step.id, type: step.type, components, description: step.description });
    step.connect(ctx);
  }

  return flow;
}
