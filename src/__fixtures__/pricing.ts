/**
 * wysiwyg-kit - Pricing Fixture
 */

import { field, leafInt, leafString, listOf, objectOf } from '../definition';
import { joinPath, listPathToString } from '../path';
import type { ListPath } from '../types';

export interface Plan {
  name: string;
  price: number;
}

export interface Pricing {
  title: string;
  plans: Plan[];
}

export type PlanPath = { kind: 'name' } | { kind: 'price' };

// 'logo' is addressable but not editable
export type PricingPath =
  | { kind: 'title' }
  | { kind: 'logo' }
  | { kind: 'plans'; path: ListPath<PlanPath> };

const planFields = {
  name: field((plan: Plan) => plan.name, (name, plan) => ({ ...plan, name }), leafString),
  price: field((plan: Plan) => plan.price, (price, plan) => ({ ...plan, price }), leafInt),
};

export const planDefinition = objectOf<PlanPath, Plan>((path) =>
  path.kind === 'name' ? planFields.name.at(undefined) : planFields.price.at(undefined)
);

const pricingFields = {
  title: field((page: Pricing) => page.title, (title, page) => ({ ...page, title }), leafString),
  plans: field((page: Pricing) => page.plans, (plans, page) => ({ ...page, plans }), listOf(planDefinition)),
};

export const pricingDefinition = objectOf<PricingPath, Pricing>((path) => {
  switch (path.kind) {
    case 'title':
      return pricingFields.title.at(undefined);
    case 'plans':
      return pricingFields.plans.at(path.path);
    case 'logo':
      return undefined;
  }
});

export const planPathToString = (path: PlanPath): string => path.kind;

export const pricingPathToString = (path: PricingPath): string =>
  path.kind === 'plans' ? joinPath('plans', listPathToString(path.path, planPathToString)) : path.kind;

export const title: PricingPath = { kind: 'title' };
export const logo: PricingPath = { kind: 'logo' };
export const allPlans: PricingPath = { kind: 'plans', path: { kind: 'list' } };
export const plan = (index: number): PricingPath => ({ kind: 'plans', path: { kind: 'item', index } });
export const planName = (index: number): PricingPath => ({
  kind: 'plans',
  path: { kind: 'child', index, path: { kind: 'name' } },
});
export const planPrice = (index: number): PricingPath => ({
  kind: 'plans',
  path: { kind: 'child', index, path: { kind: 'price' } },
});

export const createPricing = (): Pricing => ({
  title: 'Pricing',
  plans: [
    { name: 'Free', price: 0 },
    { name: 'Pro', price: 15 },
  ],
});
