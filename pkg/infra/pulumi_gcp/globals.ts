import * as pulumi from '@pulumi/pulumi'

export const PACKAGE_NAME = 'gke-kubeconfig-component'

// Read per construction: in a provider process the engine sends config with each construct call.
export function componentConfig(): pulumi.Config {
    return new pulumi.Config(PACKAGE_NAME)
}

export function strictInputs(): boolean {
    return componentConfig().getBoolean('strictInputs') ?? true
}
