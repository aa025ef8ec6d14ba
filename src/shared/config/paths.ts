/**
 * Layout of the per-project workspace directory
 */

import path from 'path';

export const WORKSPACE_DIR = '.pentad';

export interface WorkspacePaths {
  projectRoot: string;
  workspace: string;
  protocols: string;
  logs: string;
  communication: string;
  goal: string;
  rules: string;
  communicationConfig: string;
  registry: string;
  features: string;
  insights: string;
  env: string;
}

export function workspacePaths(projectRoot: string): WorkspacePaths {
  const workspace = path.join(projectRoot, WORKSPACE_DIR);
  const communication = path.join(workspace, 'communication');
  const protocols = path.join(workspace, 'protocols');
  const features = path.join(projectRoot, 'features');

  return {
    projectRoot,
    workspace,
    protocols,
    logs: path.join(workspace, 'logs'),
    communication,
    goal: path.join(workspace, 'goal.yaml'),
    rules: path.join(protocols, 'rules.yml'),
    communicationConfig: path.join(communication, 'config.yml'),
    registry: path.join(communication, 'pids.json'),
    features,
    insights: path.join(features, 'insights.md'),
    env: path.join(projectRoot, '.env'),
  };
}
