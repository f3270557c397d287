/**
 * Pricing page - wysiwyg-kit example with a nested list
 */

import {
  createEditor,
  field,
  joinPath,
  leafInt,
  leafString,
  listOf,
  listPathToString,
  objectOf,
  type Comment,
  type ListPath,
} from '../../src';

export interface Plan {
  name: string;
  price: number;
}

export interface Pricing {
  title: string;
  plans: Plan[];
}

export type PlanPath = { kind: 'name' } | { kind: 'price' };

export type PricingPath = { kind: 'title' } | { kind: 'plans'; path: ListPath<PlanPath> };

const planFields = {
  name: field((plan: Plan) => plan.name, (name, plan) => ({ ...plan, name }), leafString),
  price: field((plan: Plan) => plan.price, (price, plan) => ({ ...plan, price }), leafInt),
};

const plan = objectOf<PlanPath, Plan>((path) =>
  path.kind === 'name' ? planFields.name.at(undefined) : planFields.price.at(undefined)
);

const pricingFields = {
  title: field((page: Pricing) => page.title, (title, page) => ({ ...page, title }), leafString),
  plans: field((page: Pricing) => page.plans, (plans, page) => ({ ...page, plans }), listOf(plan)),
};

export const pricing = objectOf<PricingPath, Pricing>((path) =>
  path.kind === 'title' ? pricingFields.title.at(undefined) : pricingFields.plans.at(path.path)
);

export const pricingPathToString = (path: PricingPath): string =>
  path.kind === 'plans' ? joinPath('plans', listPathToString(path.path, (p) => p.kind)) : path.kind;

const me = { name: 'You', avatar: 'https://example.com/avatar.png' };

// Stands in for a backend call
const postComment = ({ text }: { text: string }): Promise<Comment> =>
  new Promise((resolve) => {
    setTimeout(() => resolve({ content: text, author: me, createdAt: Date.now() }), 300);
  });

export const usePricing = createEditor(pricing, {
  data: {
    title: 'Pricing',
    plans: [
      { name: 'Free', price: 0 },
      { name: 'Pro', price: 15 },
    ],
  },
  pathToString: pricingPathToString,
  createComment: postComment,
});
