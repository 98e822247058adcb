import {InitConfig} from "./types/module";

let _config: InitConfig | null = null;

export function init(config: InitConfig) {
    _config = config;
}

export function getInit(): InitConfig {
    if (!_config) {
        throw new Error("Config not initialized. Call init(config) before using any class.");
    }

    return _config;
}
