import {
	captureExceptionAndReport,
	createHuntGlitchLogger,
	installProcessHandlers,
	runWithErrorReporting,
	sendHuntGlitchLog,
	withErrorReporting,
} from "huntglitch";

// Keys come from HUNTGLITCH_PROJECT_KEY / HUNTGLITCH_DELIVERABLE_KEY unless passed here.

async function main() {
	const huntglitch = createHuntGlitchLogger({ silentFailures: true, maxRetries: 2 });
	const uninstall = installProcessHandlers(huntglitch);

	// Send a custom event
	console.log("Sending a custom event...");
	const sent = await huntglitch.sendLog({
		errorName: "UserSignup",
		errorValue: "A new user signed up",
		sourceFile: "examples/basic/src/index.ts",
		sourceLine: 20,
		severity: "info",
		additionalData: { plan: "pro" },
		tags: { feature: "signup" },
	});
	console.log(`  Delivered: ${sent}`);

	// Report a caught error
	console.log("\nReporting a caught error...");
	try {
		JSON.parse("{ not json");
	} catch (err) {
		const reported = await huntglitch.captureException(err, {
			severity: "warning",
			additionalData: { step: "parse-config" },
		});
		console.log(`  Reported: ${reported}`);
	}

	// Wrap a function: errors are reported, then rethrown
	const divide = withErrorReporting(
		(a: number, b: number) => {
			if (b === 0) throw new RangeError("Division by zero");
			return a / b;
		},
		{ logger: huntglitch, name: "divide" },
	);
	console.log("\nCalling a wrapped function...");
	await divide(1, 0).catch((err: unknown) => console.log(`  Rethrown: ${String(err)}`));

	// Run a named operation
	console.log("\nRunning a named operation...");
	await runWithErrorReporting(
		"load_inventory",
		async () => {
			throw new Error("Inventory service unavailable");
		},
		{ logger: huntglitch, extra: { warehouse: "north" } },
	).catch((err: unknown) => console.log(`  Rethrown: ${String(err)}`));

	// One-shot helpers read configuration from the environment
	console.log("\nUsing the one-shot helpers...");
	await sendHuntGlitchLog({
		errorName: "Heartbeat",
		errorValue: "Example finished",
		sourceFile: "examples/basic/src/index.ts",
		sourceLine: 70,
	});
	await captureExceptionAndReport(new Error("Example error"), { tags: { example: "basic" } });

	uninstall();
	console.log("\nDone!");
}

main().catch(console.error);
