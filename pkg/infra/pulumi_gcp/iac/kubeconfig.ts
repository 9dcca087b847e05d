import { parseDocument } from 'yaml'
import {
    ConflictingAttributeError,
    MalformedInput,
    MalformedInputError,
    MissingAttributeError,
    NestedAttributeError,
} from './errors'
import { validateValue, ValidationOptions } from './sanitization/sanitizer'
import { cluster } from './sanitization/gcp/gke'

export const CLUSTER_NAME = 'cluster_name'
export const CLUSTER_ENDPOINT = 'cluster_endpoint'
export const CLUSTER_CA_CERTIFICATE = 'cluster_ca_certificate'
export const CLUSTER_MASTER_AUTH = 'cluster_master_auth'

export type AttributeName =
    | typeof CLUSTER_NAME
    | typeof CLUSTER_ENDPOINT
    | typeof CLUSTER_CA_CERTIFICATE
    | typeof CLUSTER_MASTER_AUTH

/**
 * The attributes as the caller supplied them. Nothing about the values is trusted until
 * {@link parseClusterIdentity} has looked at them.
 */
export type ClusterAttributes = { [K in AttributeName]?: unknown }

/**
 * certificate: the CA certificate is passed directly as `cluster_ca_certificate`.
 * masterAuth: it is read from the `cluster_ca_certificate` key of the `cluster_master_auth`
 * record, as exposed by the `masterAuth` field of a GKE cluster.
 */
export type CredentialMode = 'certificate' | 'masterAuth'

export type ClusterIdentity = { clusterName: string; clusterEndpoint: string } & (
    | { mode: 'certificate'; clusterCaCertificate: string }
    | { mode: 'masterAuth'; clusterMasterAuth: { [key: string]: unknown } }
)

export interface KubeconfigInputs {
    name: string
    endpoint: string
    caCertificate: string
}

export interface BuildOptions {
    /**
     * Reject names, endpoints and certificates that would not survive unquoted substitution into
     * YAML. Defaults to true.
     */
    strict?: boolean
    /** Receives each malformed input when `strict` is false. */
    onMalformedInput?: (input: MalformedInput) => void
    /** Credential mode decided before the attributes resolved; overrides {@link credentialMode}. */
    mode?: CredentialMode
}

const REQUIRED_ATTRIBUTES: { [M in CredentialMode]: readonly AttributeName[] } = {
    certificate: [CLUSTER_NAME, CLUSTER_ENDPOINT, CLUSTER_CA_CERTIFICATE],
    masterAuth: [CLUSTER_NAME, CLUSTER_ENDPOINT, CLUSTER_MASTER_AUTH],
}

export function credentialMode(attributes: ClusterAttributes): CredentialMode {
    return attributes[CLUSTER_MASTER_AUTH] !== undefined &&
        attributes[CLUSTER_CA_CERTIFICATE] == null
        ? 'masterAuth'
        : 'certificate'
}

export function requiredAttributes(mode: CredentialMode): readonly AttributeName[] {
    return REQUIRED_ATTRIBUTES[mode]
}

export function findMissingAttributes(
    attributes: ClusterAttributes,
    required: readonly AttributeName[]
): AttributeName[] {
    return required.filter((name) => attributes[name] == null)
}

export function parseClusterIdentity(
    attributes: ClusterAttributes,
    mode: CredentialMode = credentialMode(attributes)
): ClusterIdentity {
    if (attributes[CLUSTER_CA_CERTIFICATE] != null && attributes[CLUSTER_MASTER_AUTH] != null) {
        throw new ConflictingAttributeError([CLUSTER_CA_CERTIFICATE, CLUSTER_MASTER_AUTH])
    }

    const required = requiredAttributes(mode)
    const missing = findMissingAttributes(attributes, required)
    if (missing.length > 0) {
        throw new MissingAttributeError(missing, required)
    }

    const {
        cluster_name: clusterName,
        cluster_endpoint: clusterEndpoint,
        cluster_ca_certificate: clusterCaCertificate,
        cluster_master_auth: clusterMasterAuth,
    } = attributes
    if (typeof clusterName === 'string' && typeof clusterEndpoint === 'string') {
        if (mode === 'masterAuth' && isRecord(clusterMasterAuth)) {
            return { mode, clusterName, clusterEndpoint, clusterMasterAuth }
        }
        if (mode === 'certificate' && typeof clusterCaCertificate === 'string') {
            return { mode, clusterName, clusterEndpoint, clusterCaCertificate }
        }
    }

    const strings: Array<[string, unknown]> = [
        [CLUSTER_NAME, clusterName],
        [CLUSTER_ENDPOINT, clusterEndpoint],
    ]
    if (mode === 'certificate') {
        strings.push([CLUSTER_CA_CERTIFICATE, clusterCaCertificate])
    }
    const violations = strings
        .filter(([, value]) => typeof value !== 'string')
        .map(([attribute, value]) => notAString(attribute, value))
    if (mode === 'masterAuth' && !isRecord(clusterMasterAuth)) {
        violations.push({
            attribute: CLUSTER_MASTER_AUTH,
            description: `expected a record, got ${describe(clusterMasterAuth)}`,
        })
    }
    throw new MalformedInputError(violations)
}

export function resolveCaCertificate(identity: ClusterIdentity): string {
    if (identity.mode === 'certificate') {
        return identity.clusterCaCertificate
    }
    const certificate = identity.clusterMasterAuth[CLUSTER_CA_CERTIFICATE]
    if (certificate == null) {
        throw new NestedAttributeError(CLUSTER_MASTER_AUTH, CLUSTER_CA_CERTIFICATE)
    }
    if (typeof certificate !== 'string') {
        throw new MalformedInputError([
            notAString(CA_CERTIFICATE_ATTRIBUTE.masterAuth, certificate),
        ])
    }
    return certificate
}

const CA_CERTIFICATE_ATTRIBUTE: { [M in CredentialMode]: string } = {
    certificate: CLUSTER_CA_CERTIFICATE,
    masterAuth: `${CLUSTER_MASTER_AUTH}.${CLUSTER_CA_CERTIFICATE}`,
}

export function findMalformedInputs(
    inputs: KubeconfigInputs,
    mode: CredentialMode
): MalformedInput[] {
    const checks: Array<[string, string, ValidationOptions]> = [
        [CLUSTER_NAME, inputs.name, cluster.nameValidation()],
        [CLUSTER_ENDPOINT, inputs.endpoint, cluster.endpointValidation()],
        [CA_CERTIFICATE_ATTRIBUTE[mode], inputs.caCertificate, cluster.caCertificateValidation()],
    ]
    return checks.flatMap(([attribute, value, validation]) =>
        validateValue(value, validation).map((v) => ({
            attribute,
            description: `${JSON.stringify(value)}: ${v}`,
        }))
    )
}

export function renderKubeconfig({ name, endpoint, caCertificate }: KubeconfigInputs): string {
    return `apiVersion: v1
clusters:
- cluster:
    certificate-authority-data: ${caCertificate}
    server: https://${endpoint}
  name: ${name}
contexts:
- context:
    cluster: ${name}
    user: ${name}
  name: ${name}
current-context: ${name}
kind: Config
preferences: {}
users:
- name: ${name}
  user:
    exec:
      apiVersion: client.authentication.k8s.io/v1beta1
      command: gke-gcloud-auth-plugin
      env: null
      installHint: Install gke-gcloud-auth-plugin for use with kubectl by following
        https://cloud.google.com/blog/products/containers-kubernetes/kubectl-auth-changes-in-gke
      interactiveMode: IfAvailable
      provideClusterInfo: true
`
}

const NAME_PATHS = [
    ['clusters', 0, 'name'],
    ['contexts', 0, 'context', 'cluster'],
    ['contexts', 0, 'context', 'user'],
    ['contexts', 0, 'name'],
    ['current-context'],
    ['users', 0, 'name'],
]

// Kubernetes clients read kubeconfig with YAML 1.1 rules (yes, on, 1_000, 0b101 are not strings).
const YAML_VERSIONS = ['1.2', '1.1'] as const

/**
 * Reads the rendered document back under YAML 1.2 and 1.1 and reports every substituted value that
 * does not come back as the same string, e.g. a cluster named `true` that reads back as a boolean.
 */
export function verifyKubeconfig(
    document: string,
    inputs: KubeconfigInputs,
    mode: CredentialMode
): MalformedInput[] {
    const parsed = YAML_VERSIONS.map((version) => parseDocument(document, { version }))
    const errors = parsed.flatMap((p) => p.errors)
    if (errors.length > 0) {
        return [
            {
                attribute: 'kubeconfig',
                description: `the rendered document is not valid YAML: ${errors[0].message}`,
            },
        ]
    }

    const checks: Array<[string, string, Array<Array<string | number>>]> = [
        [CLUSTER_NAME, inputs.name, NAME_PATHS],
        [CLUSTER_ENDPOINT, `https://${inputs.endpoint}`, [['clusters', 0, 'cluster', 'server']]],
        [
            CA_CERTIFICATE_ATTRIBUTE[mode],
            inputs.caCertificate,
            [['clusters', 0, 'cluster', 'certificate-authority-data']],
        ],
    ]
    const violations: MalformedInput[] = []
    for (const [attribute, expected, paths] of checks) {
        mismatch: for (const [i, version] of YAML_VERSIONS.entries()) {
            for (const path of paths) {
                const actual = parsed[i].getIn(path)
                if (actual !== expected) {
                    violations.push({
                        attribute,
                        description:
                            `${path.join('.')} reads back as ${describe(actual)} ` +
                            `instead of ${JSON.stringify(expected)} (YAML ${version})`,
                    })
                    break mismatch
                }
            }
        }
    }
    return violations
}

/**
 * Validates the attributes and renders the kubeconfig. Either the complete document is returned or
 * a {@link KubeconfigValidationError} is thrown; nothing is produced in between.
 */
export function buildKubeconfig(
    attributes: ClusterAttributes,
    options: BuildOptions = {}
): string {
    const strict = options.strict ?? true
    const identity = parseClusterIdentity(attributes, options.mode)
    const inputs: KubeconfigInputs = {
        name: identity.clusterName,
        endpoint: identity.clusterEndpoint,
        caCertificate: resolveCaCertificate(identity),
    }

    const malformed = findMalformedInputs(inputs, identity.mode)
    if (strict && malformed.length > 0) {
        throw new MalformedInputError(malformed)
    }

    const document = renderKubeconfig(inputs)

    malformed.push(...verifyKubeconfig(document, inputs, identity.mode))
    if (strict && malformed.length > 0) {
        throw new MalformedInputError(malformed)
    }
    for (const input of malformed) {
        options.onMalformedInput?.(input)
    }
    return document
}

function isRecord(value: unknown): value is { [key: string]: unknown } {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function notAString(attribute: string, value: unknown): MalformedInput {
    return { attribute, description: `expected a string, got ${describe(value)}` }
}

function describe(value: unknown): string {
    if (Array.isArray(value)) {
        return 'an array'
    }
    return typeof value === 'string' || value == null
        ? JSON.stringify(value) ?? 'undefined'
        : `${typeof value} ${String(value)}`
}
