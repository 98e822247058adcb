import * as gcp from "@pulumi/gcp";
import * as pulumi from "@pulumi/pulumi";

export type InitConfig = {
    project: string;
    projectId: string;
    region: string;
    generalLabels: Record<string, string>;
    provider?: gcp.Provider;
    transformations?: pulumi.ResourceTransformation[];
}
