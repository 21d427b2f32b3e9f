/**
 * Pipeline stage definitions
 * Each stage is a plain record; the orchestrator walks the list in order
 */

import { ContentClient } from '../collaborators/content';
import { CallingClient } from '../collaborators/calling';
import { Lead } from '../state/types';
import { CALL_SCRIPT_TEMPLATE, CLASSIFY_TEMPLATE, DRAFT_TEMPLATE, RESEARCH_TEMPLATE, REVIEW_TEMPLATE } from './prompts';

export interface ContentStage {
  name: 'research' | 'draft' | 'review';
  kind: 'content';
  inputTemplate: string;
  client: ContentClient;
}

export interface CallStage {
  name: 'call';
  kind: 'call';
  inputTemplate: string;
  client: CallingClient;
}

export interface ClassifyStage {
  name: 'classify';
  kind: 'classify';
  inputTemplate: string;
  client: ContentClient;
}

export type StageDefinition = ContentStage | CallStage | ClassifyStage;

export const STAGE_ORDER = ['research', 'draft', 'review', 'call', 'classify'] as const;

export interface StageClients {
  content: ContentClient;
  calling: CallingClient;
}

export function buildStages(clients: StageClients): StageDefinition[] {
  return [
    { name: 'research', kind: 'content', inputTemplate: RESEARCH_TEMPLATE, client: clients.content },
    { name: 'draft', kind: 'content', inputTemplate: DRAFT_TEMPLATE, client: clients.content },
    { name: 'review', kind: 'content', inputTemplate: REVIEW_TEMPLATE, client: clients.content },
    { name: 'call', kind: 'call', inputTemplate: CALL_SCRIPT_TEMPLATE, client: clients.calling },
    { name: 'classify', kind: 'classify', inputTemplate: CLASSIFY_TEMPLATE, client: clients.content },
  ];
}

// One "field: value" line per populated lead field
export function buildLeadContext(lead: Lead): string {
  const fields: Array<[string, string | number | undefined]> = [
    ['name', lead.name],
    ['address', lead.address],
    ['phone', lead.phone],
    ['email', lead.email],
    ['website', lead.website],
    ['category', lead.category],
    ['rating', lead.rating],
  ];
  return fields
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => `${key}: ${value}`)
    .join('\n');
}
