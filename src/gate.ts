/**
 * Condition Gate
 *
 * Scheduler-facing wrapper around the condition core. On each tick it decides
 * whether a task runs now and, if not, how long the scheduler may sleep before
 * checking again. Evaluation failures are reported per task.
 */

import { type Duration, ZERO, seconds } from './core'
import type { LocalDateTime } from './time-date'
import { type Condition, ConditionEvaluationError, evaluate, formatCondition } from './condition-evaluation'
import { estimateInContext } from './condition-cycle'
import { nowFor, snapshotContext } from './clock'
import { type GateConfig, resolveGateConfig } from './config'

// ============================================================================
// Types
// ============================================================================

/** `checkedAt` is the instant time conditions were judged at. */
export type GateDecision =
  | { task: string; status: 'run'; checkedAt: LocalDateTime }
  | { task: string; status: 'wait'; checkedAt: LocalDateTime; estimate: Duration; sleep: Duration }
  | { task: string; status: 'error'; checkedAt: LocalDateTime; error: ConditionEvaluationError; sleep: Duration }

export type GatedTask = {
  name: string
  condition: Condition
}

export type ConditionGate = {
  check: (task: string, condition: Condition) => GateDecision
  checkAll: (tasks: readonly GatedTask[]) => GateDecision[]
  /** Seconds until any of the decided tasks needs another look */
  nextWake: (decisions: readonly GateDecision[]) => Duration
}

// ============================================================================
// Factory
// ============================================================================

export function createConditionGate(config: GateConfig): ConditionGate {
  const { context, minSleep, maxSleep, logger } = resolveGateConfig(config)

  function clampSleep(estimate: Duration): Duration {
    return seconds(Math.min(maxSleep, Math.max(minSleep, estimate)))
  }

  function check(task: string, condition: Condition): GateDecision {
    // Evaluation and estimate read the same instants
    const tick = snapshotContext(context)
    const checkedAt = nowFor(tick, 'time')
    let ready: boolean
    let estimate: Duration = ZERO
    try {
      ready = evaluate(condition, tick)
      if (!ready) estimate = estimateInContext(condition, tick)
    } catch (err) {
      if (!(err instanceof ConditionEvaluationError)) throw err
      logger.warn({ task, condition: formatCondition(condition), err }, 'condition evaluation failed')
      return { task, status: 'error', checkedAt, error: err, sleep: minSleep }
    }

    if (ready) {
      logger.debug({ task, status: 'run' }, 'condition met')
      return { task, status: 'run', checkedAt }
    }

    const sleep = clampSleep(estimate)
    logger.debug({ task, status: 'wait', estimate, sleep }, 'condition not met')
    return { task, status: 'wait', checkedAt, estimate, sleep }
  }

  function checkAll(tasks: readonly GatedTask[]): GateDecision[] {
    return tasks.map((t) => check(t.name, t.condition))
  }

  function nextWake(decisions: readonly GateDecision[]): Duration {
    if (decisions.length === 0) return maxSleep
    let wake: Duration = maxSleep
    for (const decision of decisions) {
      if (decision.status === 'run') return ZERO
      if (decision.sleep < wake) wake = decision.sleep
    }
    return wake
  }

  return { check, checkAll, nextWake }
}
