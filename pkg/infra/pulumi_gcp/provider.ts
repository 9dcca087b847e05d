import * as pulumi from '@pulumi/pulumi'
import * as provider from '@pulumi/pulumi/provider'
import { GKE_KUBECONFIG_TYPE, GkeKubeconfig, GkeKubeconfigArgs } from './iac/gke_kubeconfig'

export type ComponentFactory = (
    name: string,
    inputs: pulumi.Inputs,
    options: pulumi.ComponentResourceOptions
) => Promise<provider.ConstructResult>

export class ComponentProvider implements provider.Provider {
    constructor(
        readonly version: string,
        readonly schema: string,
        private readonly factories: ReadonlyMap<string, ComponentFactory>
    ) {}

    async construct(
        name: string,
        type: string,
        inputs: pulumi.Inputs,
        options: pulumi.ComponentResourceOptions
    ): Promise<provider.ConstructResult> {
        const factory = this.factories.get(type)
        if (!factory) {
            throw new Error(`unknown resource type ${type}`)
        }
        return factory(name, inputs, options)
    }
}

export async function constructGkeKubeconfig(
    name: string,
    inputs: pulumi.Inputs,
    options: pulumi.ComponentResourceOptions
): Promise<provider.ConstructResult> {
    const args: GkeKubeconfigArgs = {
        cluster_name: inputs['cluster_name'],
        cluster_endpoint: inputs['cluster_endpoint'],
        cluster_ca_certificate: inputs['cluster_ca_certificate'],
        cluster_master_auth: inputs['cluster_master_auth'],
    }
    const component = new GkeKubeconfig(name, args, options)
    return {
        urn: component.urn,
        state: {
            kubeconfig: component.kubeconfig,
        },
    }
}

export const components: ReadonlyMap<string, ComponentFactory> = new Map([
    [GKE_KUBECONFIG_TYPE, constructGkeKubeconfig],
])
