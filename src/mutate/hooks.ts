import { Driver } from '../helpers/database_adapters'
import { OrmRecord } from '../types'

export type HookEvent =
    | 'before_save'
    | 'after_save'
    | 'before_delete'
    | 'after_delete'

export type HookContext = {
    readonly model: string
    readonly operation: 'insert' | 'update' | 'delete'
    /**
     * Driver the write runs on, which is the transaction's driver inside create_with_related
     */
    readonly driver: Driver
}

/**
 * Before hooks may change the record, the write uses whatever the record holds once they are done
 */
export type Hook = (
    record: OrmRecord,
    context: HookContext
) => void | Promise<void>

/**
 * Lifecycle hooks by model and event. Hooks run one after another in registration order.
 */
export class HookRegistry {
    private readonly hooks = new Map<string, Map<HookEvent, Hook[]>>()

    /**
     * @returns a function that removes the hook again
     */
    on(model: string, event: HookEvent, hook: Hook) {
        const model_hooks = this.hooks.get(model) ?? new Map<HookEvent, Hook[]>()
        model_hooks.set(event, [...(model_hooks.get(event) ?? []), hook])
        this.hooks.set(model, model_hooks)

        return () => {
            const event_hooks = model_hooks.get(event) ?? []
            model_hooks.set(
                event,
                event_hooks.filter(el => el !== hook)
            )
        }
    }

    get_hooks(model: string, event: HookEvent): readonly Hook[] {
        return this.hooks.get(model)?.get(event) ?? []
    }

    async run(
        event: HookEvent,
        record: OrmRecord,
        context: HookContext
    ) {
        for (const hook of this.get_hooks(context.model, event)) {
            await hook(record, context)
        }
    }
}
