import { BadRequestException } from '@nestjs/common';
import { SubscriptionPlan } from '../enums/license.enums';

export interface PlanDefinition {
	readonly plan: SubscriptionPlan;
	readonly displayName: string;
	/** 0 means unlimited. */
	readonly serverLimit: number;
	readonly priceLabel: string;
}

export const TRIAL_PLAN = SubscriptionPlan.TRIAL_14;
export const TRIAL_PERIOD_DAYS = 14;
export const DEFAULT_LICENSE_MONTHS = 12;
export const DAYS_PER_LICENSE_MONTH = 30;

const definePlan = (
	plan: SubscriptionPlan,
	displayName: string,
	serverLimit: number,
	priceLabel: string,
): PlanDefinition => Object.freeze({ plan, displayName, serverLimit, priceLabel });

export const PLAN_CATALOG: ReadonlyMap<SubscriptionPlan, PlanDefinition> = new Map([
	[SubscriptionPlan.PERSONAL, definePlan(SubscriptionPlan.PERSONAL, 'Personal', 3, '¥5,000/month')],
	[SubscriptionPlan.ACADEMIC, definePlan(SubscriptionPlan.ACADEMIC, 'Academic', 10, '¥50,000/month')],
	[SubscriptionPlan.STARTUP, definePlan(SubscriptionPlan.STARTUP, 'Startup', 50, '¥200,000/month')],
	[SubscriptionPlan.STANDARD, definePlan(SubscriptionPlan.STANDARD, 'Standard', 500, '¥1,000,000/month')],
	[SubscriptionPlan.ENTERPRISE, definePlan(SubscriptionPlan.ENTERPRISE, 'Enterprise', 99999, '¥1,500,000+/month')],
	[SubscriptionPlan.BETA, definePlan(SubscriptionPlan.BETA, 'Beta Test', 50, '50% off')],
	[SubscriptionPlan.TRIAL_14, definePlan(SubscriptionPlan.TRIAL_14, '14-Day Trial', 1, 'Free')],
	[SubscriptionPlan.TRIAL, definePlan(SubscriptionPlan.TRIAL, 'Trial Consultation', 0, 'Free')],
	[SubscriptionPlan.CONSULTATION, definePlan(SubscriptionPlan.CONSULTATION, 'Free Consultation', 0, 'Free')],
	[SubscriptionPlan.OTHER, definePlan(SubscriptionPlan.OTHER, 'Other', 0, '-')],
]);

const PLAN_IDS: readonly string[] = Object.values(SubscriptionPlan);

const isSubscriptionPlan = (value: string): value is SubscriptionPlan => PLAN_IDS.includes(value);

/**
 * Resolve a plan identifier against the catalog.
 * Unknown identifiers are a client error, not a server fault.
 */
export function getPlan(plan: string): PlanDefinition {
	const definition = isSubscriptionPlan(plan) ? PLAN_CATALOG.get(plan) : undefined;
	if (!definition) {
		throw new BadRequestException(`Unknown plan: ${plan}`);
	}
	return definition;
}
