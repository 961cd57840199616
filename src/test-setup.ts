import chalk from "chalk";

// Plain output so assertions can match printed lines exactly
chalk.level = 0;
