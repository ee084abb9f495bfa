import { createPackageVitestConfig } from "../../vitest.package-config";

export default createPackageVitestConfig("engine");
