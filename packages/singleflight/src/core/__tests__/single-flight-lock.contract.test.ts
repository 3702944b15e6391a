import { describeSingleFlightLockContract } from "../../ports/__tests__/single-flight-lock.contract"
import { createSingleFlightLock, SingleFlightLock } from "../single-flight-lock"

describeSingleFlightLockContract("SingleFlightLock", () => new SingleFlightLock())

describeSingleFlightLockContract("createSingleFlightLock", () =>
  createSingleFlightLock({ name: "contract" }),
)
