// Table catalogue for the conservation warehouse star schema
// Both stores build their statements from these specs

import type { EntityName, TableName } from '@conservation-warehouse/types'

export const SCHEMA_VERSION = 4

export type ColumnType = 'integer' | 'real' | 'text' | 'boolean'
export type AnomalyTableName = 'fact_anomaly'
export type StoredTableName = TableName | AnomalyTableName

export interface ColumnSpec {
  name: string
  type: ColumnType
  nullable: boolean
  references?: TableName
}

export interface TableSpec {
  name: StoredTableName
  kind: 'dimension' | 'fact' | 'annotation'
  primaryKey: string
  naturalKey: string
  columns: ColumnSpec[]
}

const col = (name: string, type: ColumnType, nullable = true, references?: TableName): ColumnSpec =>
  references ? { name, type, nullable, references } : { name, type, nullable }

const factColumns = (...columns: ColumnSpec[]): ColumnSpec[] => [
  col('row_id', 'integer', false),
  col('natural_key', 'text', false),
  ...columns,
]

export const TABLES: Record<StoredTableName, TableSpec> = {
  dim_donor: {
    name: 'dim_donor',
    kind: 'dimension',
    primaryKey: 'donor_key',
    naturalKey: 'donor_id',
    columns: [
      col('donor_key', 'integer', false),
      col('donor_id', 'text', false),
      col('first_name', 'text'),
      col('last_name', 'text'),
      col('email', 'text'),
      col('phone', 'text'),
      col('address', 'text'),
      col('city', 'text'),
      col('state', 'text'),
      col('zip_code', 'text'),
      col('donor_type', 'text'),
      col('join_date', 'text'),
      col('membership_level', 'text'),
    ],
  },
  dim_campaign: {
    name: 'dim_campaign',
    kind: 'dimension',
    primaryKey: 'campaign_key',
    naturalKey: 'campaign_id',
    columns: [
      col('campaign_key', 'integer', false),
      col('campaign_id', 'text', false),
      col('campaign_name', 'text', false),
      col('campaign_type', 'text'),
      col('start_date', 'text'),
      col('end_date', 'text'),
      col('goal_amount', 'real'),
      col('description', 'text'),
      col('target_region', 'text'),
      col('status', 'text'),
    ],
  },
  dim_habitat: {
    name: 'dim_habitat',
    kind: 'dimension',
    primaryKey: 'habitat_key',
    naturalKey: 'habitat_id',
    columns: [
      col('habitat_key', 'integer', false),
      col('habitat_id', 'text', false),
      col('habitat_name', 'text', false),
      col('state', 'text'),
      col('region', 'text'),
      col('total_acres', 'real'),
      col('habitat_quality_score', 'integer'),
      col('conservation_status', 'text'),
      col('primary_threats', 'text'),
    ],
  },
  dim_project: {
    name: 'dim_project',
    kind: 'dimension',
    primaryKey: 'project_key',
    naturalKey: 'project_id',
    columns: [
      col('project_key', 'integer', false),
      col('project_id', 'text', false),
      col('project_name', 'text', false),
      col('project_type', 'text'),
      col('state', 'text'),
      col('county', 'text'),
      col('status', 'text'),
      col('start_date', 'text'),
      col('end_date', 'text'),
      col('partner_organizations', 'text'),
      col('description', 'text'),
    ],
  },
  dim_date: {
    name: 'dim_date',
    kind: 'dimension',
    primaryKey: 'date_key',
    naturalKey: 'full_date',
    columns: [
      col('date_key', 'integer', false),
      col('full_date', 'text', false),
      col('year', 'integer', false),
      col('quarter', 'integer', false),
      col('month', 'integer', false),
      col('month_name', 'text', false),
      col('week', 'integer', false),
      col('day_of_month', 'integer', false),
      col('day_of_week', 'integer', false),
      col('day_name', 'text', false),
      col('is_weekend', 'boolean', false),
      col('fiscal_year', 'integer', false),
      col('fiscal_quarter', 'integer', false),
    ],
  },
  fact_donation: {
    name: 'fact_donation',
    kind: 'fact',
    primaryKey: 'row_id',
    naturalKey: 'natural_key',
    columns: factColumns(
      col('donation_id', 'text', false),
      col('donor_key', 'integer', false, 'dim_donor'),
      col('campaign_key', 'integer', false, 'dim_campaign'),
      col('date_key', 'integer', false),
      col('amount', 'real', false),
      col('payment_method', 'text'),
      col('is_recurring', 'boolean', false),
      col('notes', 'text'),
    ),
  },
  fact_elk_population: {
    name: 'fact_elk_population',
    kind: 'fact',
    primaryKey: 'row_id',
    naturalKey: 'natural_key',
    columns: factColumns(
      col('habitat_id', 'text', false),
      col('habitat_key', 'integer', false, 'dim_habitat'),
      col('year', 'integer', false),
      col('date_key', 'integer', false),
      col('elk_count', 'integer', false),
      col('population_change', 'integer'),
      col('population_change_pct', 'real'),
    ),
  },
  fact_conservation: {
    name: 'fact_conservation',
    kind: 'fact',
    primaryKey: 'row_id',
    naturalKey: 'natural_key',
    columns: factColumns(
      col('project_id', 'text', false),
      col('habitat_id', 'text'),
      col('project_key', 'integer', false, 'dim_project'),
      col('habitat_key', 'integer', true, 'dim_habitat'),
      col('date_key', 'integer', false),
      col('budget', 'real'),
      col('spent_to_date', 'real'),
      col('acres_protected', 'real'),
      col('elk_population_impacted', 'integer'),
    ),
  },
  fact_financial_filing: {
    name: 'fact_financial_filing',
    kind: 'fact',
    primaryKey: 'row_id',
    naturalKey: 'natural_key',
    columns: factColumns(
      col('tax_year', 'integer', false),
      col('fiscal_year', 'integer', false),
      col('date_key', 'integer', false),
      col('organization_name', 'text'),
      col('ein', 'text'),
      col('contributions_and_grants', 'real'),
      col('program_service_revenue', 'real'),
      col('investment_income', 'real'),
      col('other_revenue', 'real'),
      col('total_revenue', 'real'),
      col('grants_and_similar_paid', 'real'),
      col('salaries_and_wages', 'real'),
      col('total_expenses', 'real'),
      col('program_services_expenses', 'real'),
      col('revenue_less_expenses', 'real'),
      col('total_assets', 'real'),
      col('total_liabilities', 'real'),
      col('net_assets', 'real'),
      col('employees_count', 'integer'),
      col('volunteers_count', 'integer'),
    ),
  },
  fact_program_service: {
    name: 'fact_program_service',
    kind: 'fact',
    primaryKey: 'row_id',
    naturalKey: 'natural_key',
    columns: factColumns(
      col('tax_year', 'integer', false),
      col('program_code', 'text', false),
      col('program_name', 'text', false),
      col('date_key', 'integer', false),
      col('expenses', 'real'),
      col('grants', 'real'),
      col('revenue', 'real'),
    ),
  },
  fact_anomaly: {
    name: 'fact_anomaly',
    kind: 'annotation',
    primaryKey: 'anomaly_id',
    naturalKey: 'anomaly_key',
    columns: [
      col('anomaly_id', 'integer', false),
      col('anomaly_key', 'text', false),
      col('entity', 'text', false),
      col('natural_key', 'text', false),
      col('rule', 'text', false),
      col('severity', 'text', false),
      col('observed_value', 'text', false),
      col('threshold', 'text', false),
      col('message', 'text', false),
    ],
  },
}

export const ENTITY_TABLES: Record<EntityName, TableName> = {
  donor: 'dim_donor',
  campaign: 'dim_campaign',
  habitat: 'dim_habitat',
  project: 'dim_project',
  date: 'dim_date',
  donation: 'fact_donation',
  elk_population: 'fact_elk_population',
  conservation_metric: 'fact_conservation',
  financial_filing: 'fact_financial_filing',
  program_service: 'fact_program_service',
}

// Tables in creation order (referenced tables first)
export const TABLE_ORDER: StoredTableName[] = [
  'dim_donor',
  'dim_campaign',
  'dim_habitat',
  'dim_project',
  'dim_date',
  'fact_donation',
  'fact_elk_population',
  'fact_conservation',
  'fact_financial_filing',
  'fact_program_service',
  'fact_anomaly',
]
