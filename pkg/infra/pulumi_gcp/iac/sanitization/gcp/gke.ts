import { regexpMatch, regexpNotMatch, ValidationOptions } from '../sanitizer'

// Values are substituted into the kubeconfig as plain YAML scalars, so anything YAML would read
// differently (colons, quotes, whitespace, line breaks) is rejected up front.
export const cluster = {
    nameValidation(): ValidationOptions {
        return {
            minLength: 1,
            rules: [
                regexpMatch(
                    'The cluster name can contain only alphanumeric characters, hyphens, ' +
                        'underscores and periods.',
                    /^[A-Za-z0-9._-]*$/
                ),
                regexpNotMatch('The cluster name must not start with a hyphen or period.', /^[-.]/),
            ],
        }
    },

    endpointValidation(): ValidationOptions {
        return {
            minLength: 1,
            rules: [
                regexpNotMatch(
                    'The cluster endpoint must not include a URL scheme; ' +
                        'https:// is added automatically.',
                    /^[A-Za-z][A-Za-z0-9+.-]*:\/\//
                ),
                regexpMatch(
                    'The cluster endpoint must be a host name or IP address, ' +
                        'optionally followed by :port.',
                    /^(\[[0-9A-Fa-f:.]+\]|[A-Za-z0-9.-]+)(:\d{1,5})?$/
                ),
            ],
        }
    },

    caCertificateValidation(): ValidationOptions {
        return {
            minLength: 1,
            rules: [
                regexpMatch(
                    'The CA certificate must be base64-encoded text on a single line.',
                    /^[A-Za-z0-9+/]*={0,2}$/
                ),
            ],
        }
    },
}
