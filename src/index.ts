import "./env";
import { runChecker } from "./app";

runChecker()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error("Unable to complete security.txt check", error);
    process.exitCode = 1;
  });
