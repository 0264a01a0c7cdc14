import { executeEnvelope } from "./blocking";

const main = async () => {
  const output = await executeEnvelope(process.argv[2]);
  process.stdout.write(`${JSON.stringify(output)}\n`);
};

main().catch((error) => {
  console.error("Blocking worker failed", error);
  process.exit(1);
});
