import {
  BACKEND_ROLES,
  DATABASE_ROLES,
  FRONTEND_ROLES,
  UI_FRAMEWORKS,
  type FolderClassification
} from './types.js';

const API_FRAMEWORKS = ['Flask', 'Django', 'FastAPI', 'Express'];
const ML_FRAMEWORKS = ['PyTorch', 'TensorFlow', 'Scikit-learn'];
const FULL_STACK_UI = UI_FRAMEWORKS.filter((f) => f !== 'Next.js' && f !== 'Svelte');

export type ArchitecturePattern =
  | 'Full-stack web application (Frontend + Backend)'
  | 'Client-Server architecture'
  | 'Backend API service with database'
  | 'Backend application'
  | 'Web API/Microservice'
  | 'Frontend application'
  | 'Machine Learning / Data Science project'
  | 'Modular application';

/**
 * Coarse label for the overall layout; first matching rule wins.
 */
export function inferArchitecturePattern(
  folders: FolderClassification,
  frameworks: readonly string[]
): ArchitecturePattern {
  const roles = Object.values(folders).map((f) => f.role);
  const has = (family: readonly string[]) => roles.some((r) => family.includes(r));
  const uses = (family: readonly string[]) => frameworks.some((f) => family.includes(f));

  const frontend = has(FRONTEND_ROLES);
  const backend = has(BACKEND_ROLES);
  const database = has(DATABASE_ROLES);

  if (frontend && backend) {
    return uses(FULL_STACK_UI) ? 'Full-stack web application (Frontend + Backend)' : 'Client-Server architecture';
  }
  if (backend && database) {
    return uses(API_FRAMEWORKS) ? 'Backend API service with database' : 'Backend application';
  }
  if (backend && uses(API_FRAMEWORKS)) return 'Web API/Microservice';
  if (frontend) return 'Frontend application';
  if (uses(ML_FRAMEWORKS)) return 'Machine Learning / Data Science project';
  return 'Modular application';
}
