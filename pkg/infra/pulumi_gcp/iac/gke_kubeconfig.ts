import * as pulumi from '@pulumi/pulumi'
import { PACKAGE_NAME, strictInputs } from '../globals'
import { MissingAttributeError } from './errors'
import {
    buildKubeconfig,
    credentialMode,
    findMissingAttributes,
    requiredAttributes,
} from './kubeconfig'

export const GKE_KUBECONFIG_TYPE = `${PACKAGE_NAME}:index:GKEKubeconfig`

export interface MasterAuthArgs {
    /** Base64-encoded public certificate of the cluster's certificate authority. */
    cluster_ca_certificate?: pulumi.Input<string>
    client_certificate?: pulumi.Input<string>
    client_key?: pulumi.Input<string>
}

export interface GkeKubeconfigArgs {
    /** The name of the GKE cluster (`name` field of the cluster resource). */
    cluster_name: pulumi.Input<string>
    /**
     * The API server address of the GKE cluster, without scheme (`endpoint` field of the cluster
     * resource).
     */
    cluster_endpoint: pulumi.Input<string>
    /**
     * The base64-encoded CA certificate of the GKE cluster. Mutually exclusive with
     * `cluster_master_auth`.
     */
    cluster_ca_certificate?: pulumi.Input<string>
    /**
     * The `masterAuth` block of the GKE cluster; its `cluster_ca_certificate` field is used.
     * Mutually exclusive with `cluster_ca_certificate`.
     */
    cluster_master_auth?: pulumi.Input<MasterAuthArgs>
}

/**
 * Generates a kubeconfig for a GKE cluster that authenticates through gke-gcloud-auth-plugin, so
 * tools outside the stack can reach the cluster's Kubernetes API.
 */
export class GkeKubeconfig extends pulumi.ComponentResource {
    public readonly kubeconfig: pulumi.Output<string>

    constructor(name: string, args: GkeKubeconfigArgs, opts?: pulumi.ComponentResourceOptions) {
        const mode = credentialMode(args)
        const required = requiredAttributes(mode)
        const missing = findMissingAttributes(args, required)
        if (missing.length > 0) {
            throw new MissingAttributeError(missing, required)
        }

        super(GKE_KUBECONFIG_TYPE, name, {}, opts)

        const strict = strictInputs()
        this.kubeconfig = pulumi
            .all([
                args.cluster_name,
                args.cluster_endpoint,
                args.cluster_ca_certificate,
                args.cluster_master_auth,
            ])
            .apply(([clusterName, clusterEndpoint, clusterCaCertificate, clusterMasterAuth]) => {
                void pulumi.log.debug(`rendering kubeconfig for cluster ${clusterName}`, this)
                return buildKubeconfig(
                    {
                        cluster_name: clusterName,
                        cluster_endpoint: clusterEndpoint,
                        cluster_ca_certificate: clusterCaCertificate,
                        cluster_master_auth: clusterMasterAuth,
                    },
                    {
                        strict,
                        mode,
                        onMalformedInput: (m) =>
                            void pulumi.log.warn(`${m.attribute}: ${m.description}`, this),
                    }
                )
            })

        this.registerOutputs({
            kubeconfig: this.kubeconfig,
        })
    }
}
