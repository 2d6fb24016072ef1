// ---------------------------------------------------------------------------------------------------------------------
// localtls
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2026 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
export * from "./certificate/certificate_builder";
export * from "./cli/localtls_cli";
export * from "./dh/dh_parameters";
export * from "./errors";
export * from "./keys/key_generator";
export * from "./misc/pem";
export * from "./misc/subject";
export * from "./misc/subject_alt_names";
export * from "./pipeline";
export * from "./render/config_renderer";
export * from "./store/parameter_store";
export * from "./toolbox";
