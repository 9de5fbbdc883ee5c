import * as S from '@effect/schema/Schema'
import * as TreeFormatter from '@effect/schema/TreeFormatter'
import * as Either from 'effect/Either'

import { type Condition, type ConditionSetter, getCondition, setCondition } from './conditions'
import { ConditionSetSpecError } from './errors'

export type Polarity = 'positive' | 'negative'

/**
 * Static configuration for one summary. `summarize` is ordered highest
 * priority first; types listed in `negativePolarity` read as bad when True,
 * every other summarized type reads as bad when False.
 */
export type ConditionSetSpec = {
  target: string
  owned: readonly string[]
  summarize: readonly string[]
  negativePolarity?: readonly string[]
}

export type CompiledConditionSet = {
  target: string
  owned: readonly string[]
  order: ReadonlyArray<{ type: string; polarity: Polarity }>
}

const ConditionSetSpecSchema = S.Struct({
  target: S.NonEmptyString,
  owned: S.Array(S.NonEmptyString),
  summarize: S.Array(S.NonEmptyString),
  negativePolarity: S.optional(S.Array(S.NonEmptyString)),
})

export const compileConditionSet = (spec: ConditionSetSpec): CompiledConditionSet => {
  const decoded = S.decodeUnknownEither(ConditionSetSpecSchema)(spec)
  if (Either.isLeft(decoded)) {
    throw new ConditionSetSpecError(`invalid condition set: ${TreeFormatter.formatErrorSync(decoded.left)}`)
  }
  const { target, owned, summarize: summarized, negativePolarity = [] } = decoded.right

  const negative = new Set(negativePolarity)
  const unsummarized = negativePolarity.filter((type) => !summarized.includes(type))
  if (unsummarized.length > 0) {
    throw new ConditionSetSpecError(
      `condition set ${target}: negative polarity types not summarized: ${unsummarized.join(', ')}`,
    )
  }

  const ownedSet = new Set(owned)
  const polarityOf = (type: string): Polarity => (negative.has(type) ? 'negative' : 'positive')
  const order = summarized
    .filter((type, index) => summarized.indexOf(type) === index)
    .filter((type) => ownedSet.has(type) || type === target)
    .map((type) => ({ type, polarity: polarityOf(type) }))

  return { target, owned: [...owned], order }
}

const isBad = (condition: Condition, polarity: Polarity) =>
  polarity === 'negative' ? condition.status === 'True' : condition.status === 'False'

const isGood = (condition: Condition, polarity: Polarity) =>
  polarity === 'negative' ? condition.status === 'False' : condition.status === 'True'

/**
 * Writes `set.target` from the summarized conditions present on `obj`. The
 * highest-priority bad condition makes the target False; otherwise the target
 * is True. With none of the summarized types present the target is untouched.
 */
export const summarize = (obj: ConditionSetter, set: CompiledConditionSet) => {
  let first: Condition | undefined
  let good: Condition | undefined
  for (const { type, polarity } of set.order) {
    const condition = getCondition(obj, type)
    if (!condition) continue
    if (isBad(condition, polarity)) {
      setCondition(obj, { type: set.target, status: 'False', reason: condition.reason, message: condition.message })
      return
    }
    first ??= condition
    if (!good && isGood(condition, polarity)) good = condition
  }

  const source = good ?? first
  if (!source) return
  setCondition(obj, { type: set.target, status: 'True', reason: source.reason, message: source.message })
}
