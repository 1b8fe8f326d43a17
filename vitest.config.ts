import {defineConfig} from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["test/**/*.test.ts"],
        // console への spy をテストごとに元に戻す
        restoreMocks: true,
    },
});
