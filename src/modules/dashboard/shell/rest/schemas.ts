/**
 * Dashboard REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import type { DashboardView } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Query / Body Schemas
// ─────────────────────────────────────────────────────────────────────────────

const YearListSchema = Type.Array(Type.Integer({ minimum: 1, maximum: 9999 }), {
  maxItems: 500,
  description: 'Selected pledge years; repeat the parameter for several years',
});

/**
 * Year selection. Without `year` every year is selected, unless `applied` marks a
 * submitted filter form, in which case no year is selected.
 */
export const DashboardQuerySchema = Type.Object({
  year: Type.Optional(YearListSchema),
  applied: Type.Optional(Type.Boolean()),
});

export type DashboardQuery = Static<typeof DashboardQuerySchema>;

export const QuestionSchema = Type.String({ maxLength: 2000 });

export const DashboardPageQuerySchema = Type.Object({
  year: Type.Optional(YearListSchema),
  applied: Type.Optional(Type.Boolean()),
  question: Type.Optional(QuestionSchema),
});

export type DashboardPageQuery = Static<typeof DashboardPageQuerySchema>;

export const AskQuestionBodySchema = Type.Object({
  question: QuestionSchema,
});

export type AskQuestionBody = Static<typeof AskQuestionBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

// Plotly figures are passed through as built by the charts module.
const ChartSpecSchema = Type.Object({
  data: Type.Array(Type.Unknown()),
  layout: Type.Unknown(),
});

const SummaryRowSchema = Type.Object({
  year: Type.Integer(),
  pledgeCount: Type.Integer(),
  totalContribution: Type.Number(),
  averageContribution: Type.Union([Type.Number(), Type.Null()]),
  fulfillmentRate: Type.Number(),
});

export const DashboardResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    yearOptions: Type.Array(Type.Integer()),
    selectedYears: Type.Array(Type.Integer()),
    charts: Type.Object({
      pledgeTrend: ChartSpecSchema,
      pledgeDistribution: ChartSpecSchema,
      fulfillmentRate: ChartSpecSchema,
      pledgePaymentScatter: ChartSpecSchema,
      pledgesByYear: ChartSpecSchema,
      combinedMetrics: ChartSpecSchema,
    }),
    summary: Type.Array(SummaryRowSchema),
  }),
});

export interface DashboardResponse {
  ok: true;
  data: DashboardView;
}

export const AnswerResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({ answer: Type.String() }),
});

export type AnswerResponse = Static<typeof AnswerResponseSchema>;

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
