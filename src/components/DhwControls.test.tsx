import { renderToStaticMarkup } from "react-dom/server";
import { describe, expect, it } from "vitest";
import DhwControls from "./DhwControls";
import ExceedanceTable from "./ExceedanceTable";
import { dhwFieldReducer, initDhwField } from "../lib/dhwInput";
import { estimateExceedanceValue } from "../lib/exceedance";

const noop = () => {};

describe("DhwControls", () => {
    it("renders the default DHW as a valid field", () => {
        const html = renderToStaticMarkup(
            <DhwControls field={initDhwField("20.0")} onEdit={noop} onUpdate={noop} />
        );
        expect(html).toContain('value="20.0"');
        expect(html).toContain('aria-invalid="false"');
        expect(html).not.toContain("2px solid red");
    });

    it("highlights invalid input and disables Update", () => {
        const field = dhwFieldReducer(initDhwField("20.0"), { type: "edit", text: "twenty" });
        const html = renderToStaticMarkup(<DhwControls field={field} onEdit={noop} onUpdate={noop} />);
        expect(html).toContain('value="twenty"');
        expect(html).toContain('aria-invalid="true"');
        expect(html).toContain("border:2px solid red");
        expect(html).toContain('disabled=""');
        expect(html).toContain(">enter a number</div>");
    });
});

describe("ExceedanceTable", () => {
    it("shows one-decimal values per region", () => {
        const html = renderToStaticMarkup(<ExceedanceTable matrix={estimateExceedanceValue(20)} />);
        expect(html).toContain(">Far North</td>");
        expect(html).toContain(">30.4</td>");
        expect(html).toContain(">33.8</td>");
        expect(html).toContain(">27.7</td>");
    });
});
