/**
 * Analyze product photos from the command line
 * Usage:
 *   npx tsx scripts/analyze-photos.ts photo1.jpg photo2.jpg
 *   npx tsx scripts/analyze-photos.ts --prospect sneakers photo1.jpg
 *   npx tsx scripts/analyze-photos.ts --barcode 0123456789012 [photo.jpg]
 */

import { AnalysisService } from "../lib/analysis";
import { getConfigurationStatus } from "../lib/config/resaleConfig";

interface CliArgs {
  prospectCategory: string | null;
  barcode: string | null;
  images: string[];
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { prospectCategory: null, barcode: null, images: [] };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--prospect") {
      args.prospectCategory = argv[++i] ?? "";
    } else if (arg === "--barcode") {
      args.barcode = argv[++i] ?? "";
    } else {
      args.images.push(arg);
    }
  }
  return args;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const status = getConfigurationStatus();
  console.log(`🔧 Configuration: ${status.summary}`);

  if (args.images.length === 0 && !args.barcode) {
    console.error("❌ Pass at least one photo path (or --barcode <code>)");
    process.exit(1);
  }

  const service = new AnalysisService();
  const unsubscribe = service.subscribe((state) => {
    if (state.is_analyzing) {
      console.log(`⏳ [${state.current_step}/${state.total_steps}] ${state.progress_message}`);
    }
  });

  try {
    if (args.barcode !== null) {
      const result =
        args.images.length > 0
          ? await service.analyzeBarcode(args.barcode, args.images)
          : await service.lookupBarcode(args.barcode);
      console.log(JSON.stringify(result, null, 2));
    } else if (args.prospectCategory !== null) {
      const result = await service.analyzeForProspecting(args.images, args.prospectCategory);
      console.log(JSON.stringify(result, null, 2));
    } else {
      const [result, colors] = await Promise.all([
        service.analyzeItem(args.images),
        service.detectColors(args.images),
      ]);
      console.log(JSON.stringify({ analysis: result, colors }, null, 2));
    }

    console.log(`✅ ${service.state.progress_message}`);
  } finally {
    unsubscribe();
    service.dispose();
  }
}

main().catch((error) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
