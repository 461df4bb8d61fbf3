// Core warehouse types

export type DimensionEntity = 'donor' | 'campaign' | 'habitat' | 'project';
export type FactEntity =
  | 'donation'
  | 'elk_population'
  | 'conservation_metric'
  | 'financial_filing'
  | 'program_service';
export type SourcedEntity = DimensionEntity | FactEntity;
export type EntityName = SourcedEntity | 'date';

export type TableName =
  | 'dim_donor'
  | 'dim_campaign'
  | 'dim_habitat'
  | 'dim_project'
  | 'dim_date'
  | 'fact_donation'
  | 'fact_elk_population'
  | 'fact_conservation'
  | 'fact_financial_filing'
  | 'fact_program_service';

// Dimension rows
export interface DonorRow {
  donor_key: number;
  donor_id: string;
  first_name: string | null;
  last_name: string | null;
  email: string | null;
  phone: string | null;
  address: string | null;
  city: string | null;
  state: string | null;
  zip_code: string | null;
  donor_type: string | null;
  join_date: string | null;
  membership_level: string | null;
}

export interface CampaignRow {
  campaign_key: number;
  campaign_id: string;
  campaign_name: string | null;
  campaign_type: string | null;
  start_date: string | null;
  end_date: string | null;
  goal_amount: number | null;
  description: string | null;
  target_region: string | null;
  status: string | null;
}

export interface HabitatRow {
  habitat_key: number;
  habitat_id: string;
  habitat_name: string | null;
  state: string | null;
  region: string | null;
  total_acres: number | null;
  habitat_quality_score: number | null;
  conservation_status: string | null;
  primary_threats: string | null; // JSON array
}

export interface ProjectRow {
  project_key: number;
  project_id: string;
  project_name: string | null;
  project_type: string | null;
  state: string | null;
  county: string | null;
  status: string | null;
  start_date: string | null;
  end_date: string | null;
  partner_organizations: string | null; // JSON array
  description: string | null;
}

export interface DateRow {
  date_key: number; // YYYYMMDD
  full_date: string;
  year: number;
  quarter: number;
  month: number;
  month_name: string;
  week: number;
  day_of_month: number;
  day_of_week: number; // 0 = Monday
  day_name: string;
  is_weekend: boolean;
  fiscal_year: number;
  fiscal_quarter: number;
}

// Fact rows (row_id is assigned by the loader)
export interface DonationRow {
  donation_id: string;
  donor_key: number | null;
  campaign_key: number | null;
  date_key: number | null;
  amount: number | null;
  payment_method: string | null;
  is_recurring: boolean;
  notes: string | null;
}

export interface ElkPopulationRow {
  habitat_id: string;
  habitat_key: number | null;
  year: number;
  date_key: number;
  elk_count: number | null;
  population_change: number | null;
  population_change_pct: number | null;
}

export interface ConservationMetricRow {
  project_id: string;
  habitat_id: string | null;
  project_key: number | null;
  habitat_key: number | null;
  date_key: number | null;
  budget: number | null;
  spent_to_date: number | null;
  acres_protected: number | null;
  elk_population_impacted: number | null;
}

export interface FinancialFilingRow {
  tax_year: number;
  fiscal_year: number;
  date_key: number;
  organization_name: string | null;
  ein: string | null;
  contributions_and_grants: number | null;
  program_service_revenue: number | null;
  investment_income: number | null;
  other_revenue: number | null;
  total_revenue: number | null;
  grants_and_similar_paid: number | null;
  salaries_and_wages: number | null;
  total_expenses: number | null;
  // Sum of the program service lines' expenses in the same filing
  program_services_expenses: number | null;
  revenue_less_expenses: number | null;
  total_assets: number | null;
  total_liabilities: number | null;
  net_assets: number | null;
  employees_count: number | null;
  volunteers_count: number | null;
}

export interface ProgramServiceRow {
  tax_year: number;
  program_code: string;
  program_name: string | null;
  date_key: number;
  expenses: number | null;
  grants: number | null;
  revenue: number | null;
}

export interface EntityRowMap {
  donor: DonorRow;
  campaign: CampaignRow;
  habitat: HabitatRow;
  project: ProjectRow;
  date: DateRow;
  donation: DonationRow;
  elk_population: ElkPopulationRow;
  conservation_metric: ConservationMetricRow;
  financial_filing: FinancialFilingRow;
  program_service: ProgramServiceRow;
}

export type ReferencedDimension = DimensionEntity | 'date';

// Natural key -> surrogate key, per dimension
export type KeyLookup = ReadonlyMap<string, number>;
export type DimensionLookups = Record<ReferencedDimension, KeyLookup>;

// Where a record came from
export interface RecordRef {
  source: string;
  line?: number;
  path?: string;
}

export interface ForeignKeyRef {
  dimension: ReferencedDimension;
  column: string;
  naturalKey: string | null;
  surrogateKey: number | null;
  nullable: boolean;
}

export interface Conformed<E extends EntityName> {
  entity: E;
  naturalKey: string;
  ref: RecordRef;
  row: EntityRowMap[E];
  foreignKeys: ForeignKeyRef[];
  businessDate: string | null;
}

export type ConformedRecord = { [E in EntityName]: Conformed<E> }[EntityName];

// Data quality
export type ViolationSeverity = 'blocking' | 'warning';
export type ViolationCategory =
  | 'conformance'
  | 'completeness'
  | 'uniqueness'
  | 'referential_integrity'
  | 'business_rule';

export interface ValidationViolation {
  entity: EntityName;
  naturalKey: string | null;
  ref: RecordRef;
  rule: string;
  category: ViolationCategory;
  severity: ViolationSeverity;
  field?: string;
  value?: unknown;
  message: string;
}

export interface ReferentialIntegrityViolation extends ValidationViolation {
  category: 'referential_integrity';
  dimension: ReferencedDimension;
  unresolvedKey: string;
}

// Anomalies
export type AnomalyRule = 'large_donation' | 'habitat_at_risk' | 'population_decline' | 'budget_overrun';
export type AnomalySeverity = 'info' | 'warning' | 'critical';

export interface AnomalyFlag {
  entity: FactEntity;
  naturalKey: string;
  rule: AnomalyRule;
  severity: AnomalySeverity;
  observedValue: number | string;
  threshold: number | string;
  message: string;
}

// Run reporting
export type RunStatus = 'success' | 'degraded' | 'failed';
export type EntityStatus = 'loaded' | 'failed' | 'skipped' | 'cancelled';

export interface EntityCounts {
  read: number;
  skipped: number;
  conformed: number;
  rejected: number;
  loaded: number;
}

export interface EntityReport {
  entity: EntityName;
  kind: 'dimension' | 'fact';
  status: EntityStatus;
  counts: EntityCounts;
  violations: { blocking: number; warning: number };
  violationsByRule: Record<string, number>;
  anomaliesByRule: Partial<Record<AnomalyRule, number>>;
  elapsedMs: number;
  error?: { code: string; message: string };
}

export interface RunReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  status: RunStatus;
  cancelled: boolean;
  entities: EntityReport[];
  totals: EntityCounts & { violations: number; anomalies: number };
  violations: ValidationViolation[];
  anomalies: AnomalyFlag[];
  error?: { code: string; message: string };
}
