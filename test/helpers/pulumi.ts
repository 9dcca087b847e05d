import * as pulumi from '@pulumi/pulumi'
import { expect } from 'chai'

export async function setupMocks(): Promise<void> {
    await pulumi.runtime.setMocks(
        {
            newResource: (args: pulumi.runtime.MockResourceArgs) => ({
                id: `${args.name}_id`,
                state: args.inputs,
            }),
            call: (args: pulumi.runtime.MockCallArgs) => args.inputs,
        },
        'project',
        'stack',
        false
    )
}

export function promiseOf<T>(output: pulumi.Output<T>): Promise<T> {
    return new Promise((resolve) => output.apply(resolve))
}

export async function rejectionOf(promise: Promise<unknown>): Promise<Error> {
    try {
        await promise
    } catch (e) {
        if (e instanceof Error) {
            return e
        }
        throw e
    }
    return expect.fail('expected the promise to reject')
}

function hasPromise(output: unknown): output is { promise(): Promise<unknown> } {
    return (
        typeof output === 'object' &&
        output !== null &&
        'promise' in output &&
        typeof output.promise === 'function'
    )
}

/**
 * The settled value of an output, rejections included. `promiseOf` never settles when the output
 * fails, and `Output.promise` is left out of the published typings.
 */
export function settledOf<T>(output: pulumi.Output<T>): Promise<unknown> {
    if (!hasPromise(output)) {
        return expect.fail('expected an Output with a promise() method')
    }
    return output.promise()
}
