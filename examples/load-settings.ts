import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { DocumentStore, MediaLoader } from "../src";

const settingsSchema = z.object({
  volume: z.number().min(0).max(1),
  music: z.object({ location: z.string(), isRemote: z.boolean() }),
});

type Settings = z.infer<typeof settingsSchema>;

const SETTINGS_PATH = path.join(os.tmpdir(), "resource-loaders-example", "settings.json");

async function main() {
  console.log("--- Resource Loaders Example ---");

  // 1. Load the settings file, creating it with defaults on the first run.
  const settings = new DocumentStore<Settings>({
    location: SETTINGS_PATH,
    schema: settingsSchema,
    createDefault: () => ({
      volume: 0.8,
      music: { location: "https://example.com/theme.mp3", isRemote: true },
    }),
  });

  const loaded = await settings.loadOrInit(
    () => console.log(`Settings ready at ${SETTINGS_PATH}`),
    (message) => console.error(`Could not load settings: ${message}`),
  );
  if (!loaded.success || !settings.value) {
    throw loaded.error ?? new Error("Settings loaded without a value.");
  }

  // 2. Load the music the settings point at.
  const music = MediaLoader.fromJSON(settings.value.music);
  await music.load(
    () => console.log(`Loaded ${music.handle?.byteLength} bytes (sha256 ${music.handle?.digest})`),
    (result, message) => console.warn(`Music unavailable (${result}): ${message}`),
  );

  // 3. Persist a change.
  settings.value = { ...settings.value, volume: 0.5 };
  await settings.save(
    () => console.log("Settings saved."),
    (message) => console.error(`Could not save settings: ${message}`),
  );

  console.log("--- Example Complete ---");
}

main().catch((error) => {
  console.error("An error occurred:", error);
  process.exit(1);
});
