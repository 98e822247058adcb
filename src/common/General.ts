import * as pulumi from "@pulumi/pulumi";
import {InitConfig} from "../types/module";

class General {
    static getValue<T>(output: pulumi.Output<T>): Promise<T> {
        return new Promise<T>(resolve => {
            output.apply(value => {
                resolve(value);
            });
        });
    }

    /**
     * Pulumi logical name fragment from a role, member or tag binding name.
     */
    static slug(value: string): string {
        return value
            .replace(/[^a-zA-Z0-9.@_-]+/g, "-")
            .replace(/^-+|-+$/g, "");
    }

    /**
     * Slugs for a set of names; two names sharing a slug would share a URN.
     */
    static uniqueSlugs(names: string[], kind: string): Record<string, string> {
        const result: Record<string, string> = {};
        const owners = new Map<string, string>();

        for (const name of names) {
            const slug = this.slug(name);
            const owner = owners.get(slug);

            if (owner !== undefined) {
                throw new Error(`${kind} names '${owner}' and '${name}' both map to resource name '${slug}'`);
            }

            owners.set(slug, name);
            result[name] = slug;
        }

        return result;
    }

    static resourceOptions(
        config: InitConfig,
        extra?: pulumi.CustomResourceOptions
    ): pulumi.CustomResourceOptions {
        return {
            ...(config.provider ? {provider: config.provider} : {}),
            ...(config.transformations ? {transformations: config.transformations} : {}),
            ...extra
        };
    }

    static nonEmpty<T extends object>(value: T | null | undefined): T | undefined {
        return value && Object.keys(value).length > 0 ? value : undefined;
    }
}

export {General}
