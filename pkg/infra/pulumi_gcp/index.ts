import * as provider from '@pulumi/pulumi/provider'
import packageJson from '../../../package.json'
import schema from './schema.json'
import { ComponentProvider, components } from './provider'

function main(args: string[]): Promise<void> {
    return provider.main(
        new ComponentProvider(packageJson.version, JSON.stringify(schema), components),
        args
    )
}

main(process.argv.slice(2)).catch((err: unknown) => {
    console.error(err)
    process.exit(1)
})
