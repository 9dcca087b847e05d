import { expect } from 'chai'
import { describe, it } from 'mocha'
import {
    regexpMatch,
    regexpNotMatch,
    validateValue,
} from '../../../../../../pkg/infra/pulumi_gcp/iac/sanitization/sanitizer'
import { cluster } from '../../../../../../pkg/infra/pulumi_gcp/iac/sanitization/gcp/gke'

describe('sanitizer', (): void => {
    it('collects every violated rule and length bound', (): void => {
        const violations = validateValue('-AB', {
            minLength: 1,
            maxLength: 2,
            rules: [
                regexpMatch('lowercase only', /^[a-z-]*$/),
                regexpNotMatch('no leading hyphen', /^-/),
            ],
        })
        expect(violations).to.deep.equal([
            'length 3 > maxLength (2)',
            'lowercase only',
            'no leading hyphen',
        ])
    })

    it('describes a pattern rule without a description by its pattern', (): void => {
        expect(regexpMatch('', /^x$/).description).to.equal(
            'The supplied string must match the following pattern: ^x$'
        )
    })

    it('accepts the names gcloud gives GKE contexts', (): void => {
        const gcloudName = 'gke_my-project_us-central1_demo'
        expect(validateValue(gcloudName, cluster.nameValidation())).to.deep.equal([])
        expect(validateValue('.hidden', cluster.nameValidation())).to.deep.equal([
            'The cluster name must not start with a hyphen or period.',
        ])
    })

    it('accepts bracketed IPv6 endpoints', (): void => {
        expect(validateValue('[2001:db8::1]:443', cluster.endpointValidation())).to.deep.equal([])
    })
})
