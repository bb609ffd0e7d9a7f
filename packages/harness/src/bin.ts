#!/usr/bin/env -S node --import tsx

import { main } from "./main";
import { fatal } from "./output";

main(process.argv, process.env).catch((err) => {
	fatal(String(err));
});
