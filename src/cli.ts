import { main } from "@/lib/app/cli";
import { errorMessage } from "@/lib/errors";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal:", errorMessage(error));
    process.exitCode = 1;
  });
