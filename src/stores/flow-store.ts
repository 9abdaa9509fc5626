/**
 * Flow Store
 *
 * Holds the sermon flow state for presentation layers. Transitions are
 * dispatched as actions through flowReducer; consumers subscribe.
 */

import { createStore } from 'zustand/vanilla'
import { redux } from 'zustand/middleware'
import {
  flowReducer,
  initialFlowState,
  type FlowAction,
  type FlowPhase,
  type FlowState
} from '../services/flowState'

export function createFlowStore(initialState: FlowState = initialFlowState) {
  return createStore(redux(flowReducer, initialState))
}

export type FlowStore = ReturnType<typeof createFlowStore>

/**
 * Call listener every time the phase changes kind or step
 */
export function subscribeToPhase(
  store: FlowStore,
  listener: (phase: FlowPhase, previous: FlowPhase) => void
): () => void {
  return store.subscribe((state, previousState) => {
    if (state.phase !== previousState.phase) {
      listener(state.phase, previousState.phase)
    }
  })
}

export type { FlowAction }
