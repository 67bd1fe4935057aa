import { atom, computed, type ReadableAtom } from "nanostores";

/**
 * Closed, or open with an optional cursor.
 * `selected: null` is Open-NoSelection.
 */
export type SelectionState =
	| { status: "closed" }
	| { status: "open"; resultCount: number; selected: number | null };

export type SelectionEvent =
	| { type: "open"; resultCount: number }
	| { type: "down" }
	| { type: "up" }
	| { type: "activate" }
	| { type: "select"; index: number }
	| { type: "dismiss" };

export type SelectionEffect = { type: "navigate"; index: number };

export interface SelectionTransition {
	state: SelectionState;
	effect?: SelectionEffect;
}

export const CLOSED: SelectionState = Object.freeze({ status: "closed" });

/**
 * Pure transition function.
 *
 * Down clamps at the last result, up from the first result wraps to the
 * last. Activating without a cursor does nothing.
 */
export function transition(state: SelectionState, event: SelectionEvent): SelectionTransition {
	switch (event.type) {
		case "open":
			return { state: { status: "open", resultCount: Math.max(0, event.resultCount), selected: null } };

		case "dismiss":
			return { state: CLOSED };

		case "down": {
			if (state.status !== "open" || state.resultCount === 0) return { state };
			const lastIndex = state.resultCount - 1;
			const selected = state.selected === null ? 0 : Math.min(state.selected + 1, lastIndex);
			return { state: { ...state, selected } };
		}

		case "up": {
			if (state.status !== "open" || state.resultCount === 0 || state.selected === null) {
				return { state };
			}
			const selected = state.selected === 0 ? state.resultCount - 1 : state.selected - 1;
			return { state: { ...state, selected } };
		}

		case "activate":
			if (state.status !== "open" || state.selected === null) return { state };
			return { state: CLOSED, effect: { type: "navigate", index: state.selected } };

		case "select":
			if (state.status !== "open" || event.index < 0 || event.index >= state.resultCount) {
				return { state };
			}
			return { state: CLOSED, effect: { type: "navigate", index: event.index } };
	}
}

export interface SelectionStore {
	$selection: ReadableAtom<SelectionState>;
	/** Cursor position, or null when closed or nothing is selected */
	$selectedIndex: ReadableAtom<number | null>;
	dispatch(event: SelectionEvent): SelectionEffect | undefined;
}

export function createSelectionStore(initial: SelectionState = CLOSED): SelectionStore {
	const $selection = atom<SelectionState>(initial);
	const $selectedIndex = computed($selection, state => (state.status === "open" ? state.selected : null));

	return {
		$selection,
		$selectedIndex,
		dispatch(event: SelectionEvent): SelectionEffect | undefined {
			const next = transition($selection.get(), event);
			if (next.state !== $selection.get()) {
				$selection.set(next.state);
			}
			return next.effect;
		},
	};
}
