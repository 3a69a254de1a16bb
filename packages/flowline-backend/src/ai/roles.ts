export type AgentRole = 'Architect' | 'Implementation' | 'Test' | 'Optimizer'

const SYSTEM_PROMPTS: Record<AgentRole, string> = {
  Architect: [
    'You are the orchestrating planner. Turn verbose, high-level user goals into concise,',
    'structured, actionable JSON contracts for specialised worker agents.',
    'Optimise for token efficiency and logical sequencing.',
    'Do not write code. Do not converse. Output only the requested JSON contract.',
  ].join('\n'),
  Implementation: [
    'You are the implementation agent. Implement exactly the feature described in the contract you receive.',
    'Every UI change ships with an end-to-end test that exercises it.',
    'Your output contains the modified source files and the test file.',
    'Do not ask questions. If you cannot finish, output a FAILURE_REPORT JSON object.',
  ].join('\n'),
  Test: [
    'You are the QA agent. Validate code and output critically.',
    'User-facing behaviour and functional correctness come before status codes.',
    'Do not write new code and do not assume success.',
  ].join('\n'),
  Optimizer: [
    'You are the cost optimisation agent. Reduce operational cost and token waste.',
    'You receive an execution log (flow id, model, input/output tokens, failure reason).',
    "Answer with a JSON object holding a 'suggestion' and an 'estimated_savings' field.",
  ].join('\n'),
}

const ROLE_ALIASES = new Map<string, AgentRole>([
  ['architect', 'Architect'],
  ['planner', 'Architect'],
  ['implementation', 'Implementation'],
  ['coder', 'Implementation'],
  ['developer', 'Implementation'],
  ['dev', 'Implementation'],
  ['test', 'Test'],
  ['tester', 'Test'],
  ['qa', 'Test'],
  ['optimizer', 'Optimizer'],
  ['auditor', 'Optimizer'],
])

export function resolveRole(role: string): AgentRole | null {
  return ROLE_ALIASES.get(role.trim().toLowerCase()) ?? null
}

export function systemPromptFor(role: AgentRole): string {
  return SYSTEM_PROMPTS[role]
}
