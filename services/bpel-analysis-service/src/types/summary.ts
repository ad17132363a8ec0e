/**
 * BPEL Summary Schema
 *
 * Zod schemas for the JSON summary written next to every PRD. The schema is
 * the contract between the extractor, the renderer and anything that reads
 * `summaries/*.json` later (the CLI `validate` command, downstream tooling).
 */

import { z } from 'zod';

export const SUMMARY_SCHEMA_VERSION = '1.0';

// ============================================================================
// Common Types
// ============================================================================

export const RiskLevel = z.enum(['low', 'medium', 'high']);
export type RiskLevel = z.infer<typeof RiskLevel>;

export const ActivityContext = z.enum(['main', 'faultHandler', 'compensationHandler', 'terminationHandler', 'eventHandler']);
export type ActivityContext = z.infer<typeof ActivityContext>;

export const GapCategory = z.enum([
  'interface',
  'data',
  'logic',
  'error-handling',
  'transaction',
  'correlation',
  'human-task',
  'concurrency',
  'timing',
  'expression',
  'extension',
  'documentation',
]);
export type GapCategory = z.infer<typeof GapCategory>;

export const ExpressionRole = z.enum([
  'condition',
  'from',
  'to',
  'query',
  'duration',
  'deadline',
  'repeatEvery',
  'startCounter',
  'finalCounter',
  'completion',
  'transition',
  'join',
]);
export type ExpressionRole = z.infer<typeof ExpressionRole>;

// ============================================================================
// Process
// ============================================================================

export const ImportSchema = z.object({
  namespace: z.string().optional(),
  location: z.string().optional(),
  importType: z.string().optional(),
});
export type ProcessImport = z.infer<typeof ImportSchema>;

export const ProcessInfoSchema = z.object({
  name: z.string(),
  targetNamespace: z.string().optional(),
  bpelVersion: z.enum(['1.1', '2.0']),
  abstract: z.boolean(),
  queryLanguage: z.string().optional(),
  expressionLanguage: z.string().optional(),
  suppressJoinFailure: z.boolean(),
  namespaces: z.record(z.string()),
  imports: z.array(ImportSchema),
  documentation: z.string().optional(),
});
export type ProcessInfo = z.infer<typeof ProcessInfoSchema>;

export const SourceInfoSchema = z.object({
  fileName: z.string(),
  sha256: z.string(),
  analyzedAt: z.string(),
  wsdlFiles: z.array(z.string()),
  xsdFiles: z.array(z.string()),
});
export type SourceInfo = z.infer<typeof SourceInfoSchema>;

// ============================================================================
// Activities
// ============================================================================

export const ActivitySchema = z.object({
  id: z.string(),
  kind: z.string(),
  name: z.string().optional(),
  parentId: z.string().optional(),
  depth: z.number().int().min(0),
  context: ActivityContext,
  line: z.number().int().min(1),
  partnerLink: z.string().optional(),
  operation: z.string().optional(),
  inputVariable: z.string().optional(),
  outputVariable: z.string().optional(),
  variable: z.string().optional(),
  createInstance: z.boolean().optional(),
  documentation: z.string().optional(),
});
export type Activity = z.infer<typeof ActivitySchema>;

// ============================================================================
// Interfaces
// ============================================================================

export const PartnerLinkOperationSchema = z.object({
  operation: z.string(),
  style: z.enum(['synchronous', 'one-way', 'asynchronous', 'callback']),
  invokedBy: z.array(z.string()),
  receivedBy: z.array(z.string()),
  repliedBy: z.array(z.string()),
  inPortType: z.boolean().optional(),
});
export type PartnerLinkOperation = z.infer<typeof PartnerLinkOperationSchema>;

export const PartnerLinkSchema = z.object({
  name: z.string(),
  scope: z.string(),
  partnerLinkType: z.string().optional(),
  myRole: z.string().optional(),
  partnerRole: z.string().optional(),
  direction: z.enum(['inbound', 'outbound', 'bidirectional', 'unknown']),
  myRolePortType: z.string().optional(),
  partnerRolePortType: z.string().optional(),
  resolved: z.boolean(),
  operations: z.array(PartnerLinkOperationSchema),
});
export type PartnerLink = z.infer<typeof PartnerLinkSchema>;

export const WsdlOperationSchema = z.object({
  name: z.string(),
  input: z.string().optional(),
  output: z.string().optional(),
  faults: z.array(z.object({ name: z.string(), message: z.string().optional() })),
});
export type WsdlOperation = z.infer<typeof WsdlOperationSchema>;

export const SchemaFieldSchema = z.object({
  name: z.string(),
  type: z.string().optional(),
  minOccurs: z.string().optional(),
  maxOccurs: z.string().optional(),
});
export type SchemaField = z.infer<typeof SchemaFieldSchema>;

export const SchemaTypeSchema = z.object({
  name: z.string(),
  kind: z.enum(['element', 'complexType', 'simpleType']),
  namespace: z.string().optional(),
  sourceFile: z.string(),
  type: z.string().optional(),
  base: z.string().optional(),
  fields: z.array(SchemaFieldSchema),
  enumerations: z.array(z.string()),
});
export type SchemaType = z.infer<typeof SchemaTypeSchema>;

export const InterfacesSchema = z.object({
  partnerLinkTypes: z.array(z.object({
    name: z.string(),
    namespace: z.string().optional(),
    sourceFile: z.string(),
    roles: z.array(z.object({
      name: z.string(),
      portType: z.string().optional(),
      /** Namespace of the port type QName, resolved where the WSDL declares it */
      portTypeNamespace: z.string().optional(),
    })),
  })),
  portTypes: z.array(z.object({
    name: z.string(),
    namespace: z.string().optional(),
    sourceFile: z.string(),
    operations: z.array(WsdlOperationSchema),
  })),
  messages: z.array(z.object({
    name: z.string(),
    namespace: z.string().optional(),
    sourceFile: z.string(),
    parts: z.array(z.object({ name: z.string(), element: z.string().optional(), type: z.string().optional() })),
  })),
  services: z.array(z.object({
    name: z.string(),
    sourceFile: z.string(),
    ports: z.array(z.object({ name: z.string(), binding: z.string().optional(), address: z.string().optional() })),
  })),
  schemaTypes: z.array(SchemaTypeSchema),
});
export type Interfaces = z.infer<typeof InterfacesSchema>;

// ============================================================================
// Data
// ============================================================================

export const VariableSchema = z.object({
  name: z.string(),
  scope: z.string(),
  kind: z.enum(['message', 'type', 'element', 'implicit']),
  messageType: z.string().optional(),
  type: z.string().optional(),
  element: z.string().optional(),
  declaredBy: z.string().optional(),
  writtenBy: z.array(z.string()),
  readBy: z.array(z.string()),
});
export type Variable = z.infer<typeof VariableSchema>;

export const CopyEndpointSchema = z.object({
  variable: z.string().optional(),
  part: z.string().optional(),
  query: z.string().optional(),
  expression: z.string().optional(),
  literal: z.string().optional(),
  partnerLink: z.string().optional(),
  endpointReference: z.string().optional(),
  property: z.string().optional(),
});
export type CopyEndpoint = z.infer<typeof CopyEndpointSchema>;

export const AssignmentSchema = z.object({
  activityId: z.string(),
  operations: z.array(z.object({
    kind: z.string(),
    from: CopyEndpointSchema.optional(),
    to: CopyEndpointSchema.optional(),
  })),
});
export type Assignment = z.infer<typeof AssignmentSchema>;

export const ExpressionSchema = z.object({
  activityId: z.string(),
  role: ExpressionRole,
  text: z.string(),
  language: z.string().optional(),
  variables: z.array(z.string()),
  functions: z.array(z.string()),
});
export type Expression = z.infer<typeof ExpressionSchema>;

// ============================================================================
// Control Flow
// ============================================================================

export const DecisionSchema = z.object({
  activityId: z.string(),
  kind: z.enum(['if', 'switch', 'pick']),
  branches: z.array(z.object({
    label: z.enum(['if', 'elseif', 'else', 'case', 'otherwise', 'onMessage', 'onAlarm']),
    condition: z.string().optional(),
    trigger: z.string().optional(),
    activityId: z.string().optional(),
  })),
  hasDefault: z.boolean(),
});
export type Decision = z.infer<typeof DecisionSchema>;

export const LoopSchema = z.object({
  activityId: z.string(),
  kind: z.enum(['while', 'repeatUntil', 'forEach']),
  condition: z.string().optional(),
  counterName: z.string().optional(),
  startCounter: z.string().optional(),
  finalCounter: z.string().optional(),
  completionCondition: z.string().optional(),
  parallel: z.boolean(),
  bodyActivityId: z.string().optional(),
});
export type Loop = z.infer<typeof LoopSchema>;

export const ConcurrencySchema = z.object({
  activityId: z.string(),
  kind: z.enum(['flow', 'forEach']),
  branches: z.array(z.string()),
  links: z.array(z.object({
    name: z.string(),
    source: z.string().optional(),
    target: z.string().optional(),
    transitionCondition: z.string().optional(),
  })),
});
export type Concurrency = z.infer<typeof ConcurrencySchema>;

// ============================================================================
// Faults, Compensation, Correlation
// ============================================================================

export const FaultsSchema = z.object({
  handlers: z.array(z.object({
    scopeId: z.string(),
    catches: z.array(z.object({
      faultName: z.string().optional(),
      faultVariable: z.string().optional(),
      faultMessageType: z.string().optional(),
      faultElement: z.string().optional(),
      activityId: z.string().optional(),
    })),
    catchAll: z.boolean(),
    catchAllActivityId: z.string().optional(),
  })),
  thrown: z.array(z.object({
    activityId: z.string(),
    faultName: z.string(),
    faultVariable: z.string().optional(),
    caughtBy: z.string().optional(),
  })),
  rethrows: z.array(z.string()),
  declared: z.array(z.object({
    partnerLink: z.string(),
    operation: z.string(),
    faultName: z.string(),
    message: z.string().optional(),
  })),
});
export type Faults = z.infer<typeof FaultsSchema>;

export const CompensationsSchema = z.object({
  handlers: z.array(z.object({ scopeId: z.string(), activityId: z.string().optional() })),
  invocations: z.array(z.object({
    activityId: z.string(),
    kind: z.enum(['compensate', 'compensateScope']),
    target: z.string().optional(),
    resolvedScopeId: z.string().optional(),
  })),
});
export type Compensations = z.infer<typeof CompensationsSchema>;

export const CorrelationsSchema = z.object({
  sets: z.array(z.object({ name: z.string(), scope: z.string(), properties: z.array(z.string()) })),
  usages: z.array(z.object({
    activityId: z.string(),
    set: z.string(),
    initiate: z.enum(['yes', 'no', 'join']),
    pattern: z.string().optional(),
  })),
});
export type Correlations = z.infer<typeof CorrelationsSchema>;

// ============================================================================
// Human Tasks, Timers, Extensions
// ============================================================================

export const HumanTaskSchema = z.object({
  activityId: z.string(),
  name: z.string(),
  taskKey: z.string().optional(),
  signals: z.array(z.string()),
});
export type HumanTask = z.infer<typeof HumanTaskSchema>;

export const TimerSchema = z.object({
  activityId: z.string(),
  kind: z.enum(['wait', 'onAlarm']),
  duration: z.string().optional(),
  deadline: z.string().optional(),
  repeatEvery: z.string().optional(),
});
export type Timer = z.infer<typeof TimerSchema>;

export const ExtensionSchema = z.object({
  activityId: z.string(),
  kind: z.enum(['java-embedding', 'extension-activity', 'vendor-assign-operation', 'vendor-element']),
  element: z.string(),
  language: z.string().optional(),
  code: z.string().optional(),
});
export type Extension = z.infer<typeof ExtensionSchema>;

// ============================================================================
// Gaps & Statistics
// ============================================================================

export const GapSchema = z.object({
  id: z.string().regex(/^GAP-\d{3,}$/),
  category: GapCategory,
  description: z.string(),
  question: z.string(),
  proposedDefault: z.string(),
  risk: RiskLevel,
  validation: z.string(),
  relatedTo: z.array(z.string()),
});
export type Gap = z.infer<typeof GapSchema>;

export const StatisticsSchema = z.object({
  activitiesByKind: z.record(z.number()),
  totalActivities: z.number(),
  variables: z.number(),
  partnerLinks: z.number(),
  decisions: z.number(),
  loops: z.number(),
  expressions: z.number(),
  gapsByRisk: z.object({ low: z.number(), medium: z.number(), high: z.number() }),
});
export type Statistics = z.infer<typeof StatisticsSchema>;

// ============================================================================
// Summary
// ============================================================================

export const BpelSummarySchema = z.object({
  schemaVersion: z.literal(SUMMARY_SCHEMA_VERSION),
  source: SourceInfoSchema,
  process: ProcessInfoSchema,
  partnerLinks: z.array(PartnerLinkSchema),
  variables: z.array(VariableSchema),
  activities: z.array(ActivitySchema),
  assignments: z.array(AssignmentSchema),
  decisions: z.array(DecisionSchema),
  loops: z.array(LoopSchema),
  faults: FaultsSchema,
  compensations: CompensationsSchema,
  correlations: CorrelationsSchema,
  humanTasks: z.array(HumanTaskSchema),
  timers: z.array(TimerSchema),
  extensions: z.array(ExtensionSchema),
  concurrency: z.array(ConcurrencySchema),
  expressions: z.array(ExpressionSchema),
  interfaces: InterfacesSchema,
  gaps: z.array(GapSchema),
  statistics: StatisticsSchema,
});
export type BpelSummary = z.infer<typeof BpelSummarySchema>;
