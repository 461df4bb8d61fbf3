// Staged field coercion per entity

import { z } from 'zod';
import type { FieldBuilders } from './fields';

export function entitySchemas(f: FieldBuilders) {
  return {
    donor: z.object({
      donor_id: f.text(),
      first_name: f.text(),
      last_name: f.text(),
      email: f.text(),
      phone: f.text(),
      address: f.text(),
      city: f.text(),
      state: f.text(),
      zip_code: f.text(),
      donor_type: f.text(),
      join_date: f.date(),
      membership_level: f.text(),
    }),
    campaign: z.object({
      campaign_id: f.text(),
      campaign_name: f.text(),
      campaign_type: f.text(),
      start_date: f.date(),
      end_date: f.date(),
      goal_amount: f.number(),
      description: f.text(),
      target_region: f.text(),
      status: f.text(),
    }),
    habitat: z.object({
      habitat_id: f.text(),
      habitat_name: f.text(),
      state: f.text(),
      region: f.text(),
      total_acres: f.number(),
      habitat_quality_score: f.integer(),
      conservation_status: f.text(),
      primary_threats: f.list(),
    }),
    project: z.object({
      project_id: f.text(),
      project_name: f.text(),
      project_type: f.text(),
      state: f.text(),
      county: f.text(),
      status: f.text(),
      start_date: f.date(),
      end_date: f.date(),
      partner_organizations: f.list(),
      description: f.text(),
    }),
    donation: z.object({
      donation_id: f.text(),
      donor_id: f.text(),
      campaign_id: f.text(),
      donation_date: f.date(),
      amount: f.number(),
      payment_method: f.text(),
      is_recurring: f.boolean(),
      notes: f.text(),
    }),
    elk_population: z.object({
      habitat_id: f.text(),
      year: f.integer(),
      elk_count: f.integer(),
    }),
    conservation_metric: z.object({
      project_id: f.text(),
      habitat_id: f.text(),
      start_date: f.date(),
      budget: f.number(),
      spent_to_date: f.number(),
      acres_protected: f.number(),
      elk_population_impacted: f.integer(),
    }),
    financial_filing: z.object({
      tax_year: f.integer(),
      organization_name: f.text(),
      ein: f.text(),
      contributions_and_grants: f.number(),
      program_service_revenue: f.number(),
      investment_income: f.number(),
      other_revenue: f.number(),
      total_revenue: f.number(),
      grants_and_similar_paid: f.number(),
      salaries_and_wages: f.number(),
      total_expenses: f.number(),
      program_services_expenses: f.number(),
      revenue_less_expenses: f.number(),
      total_assets: f.number(),
      total_liabilities: f.number(),
      net_assets: f.number(),
      employees_count: f.integer(),
      volunteers_count: f.integer(),
    }),
    program_service: z.object({
      tax_year: f.integer(),
      program_code: f.text(),
      program_name: f.text(),
      expenses: f.number(),
      grants: f.number(),
      revenue: f.number(),
    }),
  };
}

export type EntitySchemas = ReturnType<typeof entitySchemas>;
