import {
  describeText,
  deleteAt,
  draftChanged,
  edit,
  EditableText,
  focusComment,
  focusDispatch,
  focusState,
  hoverCommentThread,
  isFocused,
  listItem,
  submitDraft,
  unhoverCommentThread,
  type Msg,
  type State,
} from '../../src';
import { pricing, usePricing, type Plan, type PlanPath, type PricingPath } from './pricing';

const title: PricingPath = { kind: 'title' };
const planPaths: PlanPath[] = [{ kind: 'name' }, { kind: 'price' }];

// Injects a plan field path into the page path
const inPlan = (index: number) => (path: PlanPath): PricingPath => ({
  kind: 'plans',
  path: { kind: 'child', index, path },
});

function CommentPanel({ path }: { path: PricingPath }) {
  const { data, comments, dispatch } = usePricing();
  const view = describeText(pricing, comments, data, path);

  return (
    <div className="mt-4 p-3 bg-yellow-50 border border-yellow-200 rounded text-sm">
      <div className="text-xs text-gray-500 mb-2">Comments on {view.key}</div>
      {view.comments.map((comment, i) => (
        <div key={i} className="mb-2">
          <span className="font-medium">{comment.author.name}:</span> {comment.content}
        </div>
      ))}
      <textarea
        value={view.draft}
        onChange={(e) => void dispatch(draftChanged(path, e.target.value))}
        className="w-full px-2 py-1 border border-gray-300 rounded"
      />
      {view.error && <div className="text-red-600">{view.error}</div>}
      <button disabled={view.saving} onClick={() => void dispatch(submitDraft(path))}>
        {view.saving ? 'Saving…' : 'Comment'}
      </button>
    </div>
  );
}

function PlanRow({ index, plan, state }: { index: number; plan: Plan; state: State<PlanPath> }) {
  const dispatch = focusDispatch(inPlan(index), usePricing((s) => s.dispatch));

  const cell = (path: PlanPath, value: string) => (
    <span
      onMouseEnter={() => void dispatch(hoverCommentThread(path))}
      onMouseLeave={() => void dispatch(unhoverCommentThread())}
      className={isFocused(state, path) ? 'bg-yellow-100' : ''}
    >
      <EditableText
        value={value}
        onChange={(text) => void dispatch(edit(path, text))}
        onFocus={() => void dispatch(focusComment(path))}
      />
    </span>
  );

  return (
    <span className="flex gap-2">
      {cell({ kind: 'name' }, plan.name)}
      <span>$</span>
      {cell({ kind: 'price' }, String(plan.price))}
    </span>
  );
}

export default function App() {
  const { data, comments, dispatch, setData } = usePricing();
  const send = (msg: Msg<PricingPath>) => void dispatch(msg);

  // The focused thread is stored by key, so find the path it came from
  const candidates = [title, ...data.plans.flatMap((_, index) => planPaths.map(inPlan(index)))];
  const selected = candidates.find((path) => isFocused(comments, path));

  return (
    <div className="max-w-2xl mx-auto p-8">
      <h1 className="text-2xl font-bold">
        <EditableText
          value={data.title}
          onChange={(text) => send(edit(title, text))}
          onFocus={() => send(focusComment(title))}
        />
      </h1>
      <ul>
        {data.plans.map((plan, index) => (
          <li key={index} className="flex gap-4">
            <PlanRow index={index} plan={plan} state={focusState(inPlan(index), comments)} />
            <button onClick={() => send(deleteAt<PricingPath>({ kind: 'plans', path: listItem(index) }))}>Delete</button>
          </li>
        ))}
      </ul>
      <button onClick={() => setData((page) => ({ ...page, plans: [...page.plans, { name: 'New plan', price: 0 }] }))}>
        Add plan
      </button>
      {selected && <CommentPanel path={selected} />}
    </div>
  );
}
