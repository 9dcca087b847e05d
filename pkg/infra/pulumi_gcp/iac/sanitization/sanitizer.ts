export interface ValidationOptions {
    maxLength?: number
    minLength?: number
    rules: Array<ValidationRule>
}

export interface ValidationRule {
    description: string

    validate(value: string): boolean
}

export function validateValue(value: string, options: ValidationOptions): Array<string> {
    const violations = new Array<string>()
    if (options.minLength != null && value.length < options.minLength) {
        violations.push(`length ${value.length} < minLength (${options.minLength})`)
    }
    if (options.maxLength != null && value.length > options.maxLength) {
        violations.push(`length ${value.length} > maxLength (${options.maxLength})`)
    }

    violations.push(...options.rules.filter((r) => !r.validate(value)).map((r) => r.description))
    return violations
}

export function regexpMatch(description: string, pattern: RegExp): ValidationRule {
    return {
        description: description
            ? description
            : `The supplied string must match the following pattern: ${pattern.source}`,
        validate: (value) => pattern.test(value),
    }
}

export function regexpNotMatch(description: string, pattern: RegExp): ValidationRule {
    return {
        description,
        validate: (value) => !pattern.test(value),
    }
}
