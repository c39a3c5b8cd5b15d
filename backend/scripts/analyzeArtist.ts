/**
 * Command-line analysis: `analyzeArtist <artist name>` prints the profile and
 * records the search in HISTORY_FILE. `--history` lists recent searches,
 * `--clear-history` empties the log.
 */
import type { AnalysisResult, HistoryLog } from "@artistlens/insight-contract";
import { config } from "../src/config";
import { createAnalysisServices } from "../src/app";
import {
    HistoryTracker,
    JsonFileHistoryStore,
} from "../src/services/history/historyTracker";

function printHistory(log: HistoryLog): void {
    if (log.length === 0) {
        console.log("No recent searches.");
        return;
    }
    log.forEach((entry, index) => {
        console.log(`${String(index + 1).padStart(2)}. ${entry.artistName}  (${entry.analyzedAt})`);
    });
}

function printResult(result: AnalysisResult): void {
    const { artist, mood, complexity, discovery, dataQuality } = result;
    console.log(`${artist.name} - ${discovery.title}`);
    console.log(`Genres: ${artist.genres.join(", ") || "none listed"}`);
    const runnerUp = mood.runnerUp ? `, runner-up ${mood.runnerUp}` : "";
    console.log(`Mood: ${mood.label} (${Math.round(mood.confidence * 100)}% confidence${runnerUp})`);
    console.log(`Complexity: ${complexity.value}/100`);
    if (dataQuality.partial) {
        console.log(`Partial data: ${dataQuality.reason ?? "some tracks could not be analyzed"}`);
    }
    console.log("");
    for (const insight of result.insights) {
        console.log(`* ${insight.personaName}: ${insight.narrative}`);
    }
}

async function main(): Promise<number> {
    const args = process.argv.slice(2);
    const tracker = new HistoryTracker(new JsonFileHistoryStore(config.historyFile));

    if (args[0] === "--history") {
        printHistory(tracker.list());
        return 0;
    }
    if (args[0] === "--clear-history") {
        tracker.clear();
        console.log("History cleared.");
        return 0;
    }

    const query = args.join(" ");
    if (!query.trim()) {
        console.error("Usage: analyzeArtist <artist name> | --history | --clear-history");
        return 2;
    }

    const { orchestrator } = createAnalysisServices(config);
    const outcome = await orchestrator.analyze(query);
    if (outcome.status === "failed") {
        console.error(`${outcome.error.kind}: ${outcome.error.message}`);
        return 1;
    }

    tracker.recordEntry(outcome.historyEntry);
    printResult(outcome.result);
    return 0;
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
