import {describe, expect, it} from "vitest";
import {getInit, init} from "./config";

describe("config", () => {
    it("throws until init is called", () => {
        expect(() => getInit()).toThrow("Config not initialized. Call init(config) before using any class.");

        init({project: "kms-test", projectId: "test-project", region: "europe-west1", generalLabels: {}});

        expect(getInit().projectId).toBe("test-project");
    });
});
