import * as pulumi from '@pulumi/pulumi'

export interface MalformedInput {
    attribute: string
    description: string
}

/**
 * Base class for every input problem the GKEKubeconfig component reports. These are user errors,
 * so they derive from RunError and are printed without a stack trace.
 */
export class KubeconfigValidationError extends pulumi.RunError {
    constructor(message: string) {
        super(message)
        this.name = new.target.name
    }
}

export class MissingAttributeError extends KubeconfigValidationError {
    constructor(
        public readonly missing: string[],
        public readonly required: readonly string[]
    ) {
        super(
            `Missing required arguments for GKEKubeconfig: ${missing.join(', ')}. ` +
                `All of the following arguments are required: ${required.join(', ')}`
        )
    }
}

export class NestedAttributeError extends KubeconfigValidationError {
    constructor(
        public readonly attribute: string,
        public readonly key: string
    ) {
        super(`Argument ${attribute} of GKEKubeconfig is missing its ${key} field`)
    }
}

export class MalformedInputError extends KubeconfigValidationError {
    constructor(public readonly violations: MalformedInput[]) {
        super(
            `Malformed arguments for GKEKubeconfig:\n\t${violations
                .map((v) => `${v.attribute}: ${v.description}`)
                .join('\n\t')}`
        )
    }
}

export class ConflictingAttributeError extends KubeconfigValidationError {
    constructor(public readonly attributes: string[]) {
        super(
            `Arguments ${attributes.join(' and ')} of GKEKubeconfig are mutually exclusive; ` +
                'supply only one'
        )
    }
}
